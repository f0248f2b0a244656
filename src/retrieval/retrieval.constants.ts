/** Chat model shared by query expansion, relevance judging and answering */
export const CHAT_MODEL = Symbol('CHAT_MODEL');

/** Implementation of {@link RelevanceJudge} used by the rerank step */
export const RELEVANCE_JUDGE = Symbol('RELEVANCE_JUDGE');
