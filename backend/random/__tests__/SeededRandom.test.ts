import { SeededRandom, seedFromClock } from '../SeededRandom';

const draw = (rng: SeededRandom, n: number) =>
  Array.from({ length: n }, () => rng.nextFloat());

describe('SeededRandom', () => {
  test('same seed, same sequence', () => {
    expect(draw(new SeededRandom(42), 20)).toEqual(draw(new SeededRandom(42), 20));
    expect(draw(new SeededRandom(42), 5)).not.toEqual(draw(new SeededRandom(43), 5));
  });

  test('xorshift32 output for seed 1', () => {
    expect(new SeededRandom(1).hex(8)).toBe('00042021');
  });

  test('seed 0 falls back to a fixed non-zero state', () => {
    expect(draw(new SeededRandom(0), 3)).toEqual(draw(new SeededRandom(0x12345678), 3));
  });

  test('intBetween covers both bounds', () => {
    const rng = new SeededRandom(7);
    const seen = new Set<number>();
    for (let i = 0; i < 500; i += 1) seen.add(rng.intBetween(1, 5));

    expect(Array.from(seen).sort()).toEqual([1, 2, 3, 4, 5]);
    expect(() => rng.intBetween(3, 2)).toThrow('requires max >= min');
  });

  test('hex returns lowercase hex of the requested length', () => {
    const rng = new SeededRandom(99);
    expect(rng.hex(32)).toMatch(/^[0-9a-f]{32}$/);
    expect(rng.hex(5)).toMatch(/^[0-9a-f]{5}$/);
  });

  test('pick requires a non-empty array', () => {
    const rng = new SeededRandom(3);
    expect(() => rng.pick([])).toThrow('non-empty');
    expect(['only']).toContain(rng.pick(['only']));
  });

  test('seedFromClock keeps the low 32 bits', () => {
    expect(seedFromClock(2 ** 32 + 5)).toBe(5);
    expect(seedFromClock(1234.9)).toBe(1234);
  });
});
