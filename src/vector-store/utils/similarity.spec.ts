import { toScoreDistance } from './similarity';

describe('toScoreDistance', () => {
  it('treats cosine scores as similarities', () => {
    expect(toScoreDistance('cosine', 0.75)).toEqual({
      score: 0.75,
      distance: 0.25,
    });
  });

  it('negates dot products for the distance', () => {
    expect(toScoreDistance('dot', 3)).toEqual({ score: 3, distance: -3 });
  });

  it('treats euclid scores as distances', () => {
    expect(toScoreDistance('euclid', 0)).toEqual({ score: 1, distance: 0 });
    expect(toScoreDistance('euclid', 3)).toEqual({ score: 0.25, distance: 3 });
  });
});
