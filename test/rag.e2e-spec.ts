import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { RagConfigModule } from '../src/config/rag-config.module';
import { EMBEDDINGS_MODEL } from '../src/embedding/embedding.constants';
import { IngestionModule } from '../src/ingestion/ingestion.module';
import { CHAT_MODEL } from '../src/retrieval/retrieval.constants';
import { RetrievalModule } from '../src/retrieval/retrieval.module';
import { QDRANT_CLIENT } from '../src/vector-store/vector-store.constants';
import { testConfigModule } from './utils/config';
import { InMemoryQdrantClient } from './utils/in-memory-qdrant.client';
import { LetterFrequencyEmbeddings } from './utils/letter-frequency.embeddings';
import { ScriptedChatModel, byStep } from './utils/scripted-chat.model';

describe('RAG service (e2e)', () => {
  let app: INestApplication;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [
        testConfigModule(),
        RagConfigModule,
        IngestionModule,
        RetrievalModule,
      ],
    })
      .overrideProvider(QDRANT_CLIENT)
      .useValue(new InMemoryQdrantClient())
      .overrideProvider(EMBEDDINGS_MODEL)
      .useValue(new LetterFrequencyEmbeddings())
      .overrideProvider(CHAT_MODEL)
      .useValue(
        new ScriptedChatModel(
          byStep({
            queries: '{"queries": []}',
            relevance: '{"scores": [1, 0, 0, 0]}',
          }),
        ),
      )
      .compile();

    app = moduleRef.createNestApplication();
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  async function ingestLetters(): Promise<void> {
    await request(app.getHttpServer())
      .post('/ingest')
      .send({
        documents: [{ content: 'A B C D', source: 'letters.txt' }],
        strategy: 'sliding_window',
        chunkSize: 2,
        chunkOverlap: 0,
      })
      .expect(200)
      .expect(({ body }) => {
        expect(body).toMatchObject({
          documentsProcessed: 1,
          documentsFailed: 0,
          chunksStored: 4,
        });
      });
  }

  it('finds an ingested span at rank 1', async () => {
    await ingestLetters();

    const { body } = await request(app.getHttpServer())
      .post('/query')
      .send({ question: 'B' })
      .expect(200);

    expect(body.status).toBe('ok');
    expect(body.queries).toEqual(['B']);
    expect(body.passages[0]).toMatchObject({ content: 'B', rank: 1 });
    expect(body.passages).toHaveLength(4);
  });

  it('clears the store idempotently', async () => {
    await ingestLetters();
    const server = app.getHttpServer();

    for (let i = 0; i < 2; i++) {
      await request(server)
        .delete('/store')
        .expect(200)
        .expect({ success: true, status: 'ok' });

      const { body } = await request(server).get('/store/stats').expect(200);
      expect(body.success).toBe(true);
      expect(body.data.totalChunks).toBe(0);
    }
  });

  it('reports store stats and chunks', async () => {
    await ingestLetters();
    const server = app.getHttpServer();

    const stats = await request(server).get('/store/stats').expect(200);
    expect(stats.body).toMatchObject({
      success: true,
      status: 'ok',
      data: { totalChunks: 4, collectionName: 'test_collection' },
    });

    const chunks = await request(server).get('/store/chunks?limit=2').expect(200);
    expect(
      chunks.body.data.map((chunk: { content: string }) => chunk.content),
    ).toEqual(['A', 'B']);
  });

  it('ingests raw text', async () => {
    const { body } = await request(app.getHttpServer())
      .post('/ingest/text')
      .send({ text: 'Photosynthesis turns light into sugar.' })
      .expect(200);

    expect(body).toMatchObject({ documentsProcessed: 1, chunksStored: 1 });
  });

  it('rejects malformed requests', async () => {
    const server = app.getHttpServer();

    await request(server)
      .post('/ingest')
      .send({ documents: [{ content: 'no source' }] })
      .expect(400);
    await request(server)
      .post('/ingest')
      .send({
        documents: [{ content: 'x', source: 'x.txt' }],
        chunkSize: 10,
        chunkOverlap: 20,
      })
      .expect(400);
    await request(server).post('/query').send({ question: '' }).expect(400);
    await request(server)
      .post('/query')
      .send({ question: 'B', filter: { nested: { a: 1 } } })
      .expect(400);
  });

  it('reports system status', async () => {
    const { body } = await request(app.getHttpServer())
      .get('/status')
      .expect(200);

    expect(body.status).toBe('healthy');
    expect(body.store.healthy).toBe(true);
  });
});
