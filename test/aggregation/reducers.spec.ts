import { SeriesKind } from '../../src/aggregation/models/series.model';
import { mergeSlots, reducerFor } from '../../src/aggregation/reducers';
import { at, powerBucket, powerSeries } from '../support/fixtures';

describe('reducers', () => {
  describe('mergeSlots', () => {
    it('lets a fresh value replace the persisted one and sorts by minute', () => {
      const merged = mergeSlots(
        [
          { minute: 30, value: 1 },
          { minute: 0, value: 2 }
        ],
        [
          { minute: 15, value: 3 },
          { minute: 30, value: 4 }
        ]
      );

      expect(merged).toEqual([
        { minute: 0, value: 2 },
        { minute: 15, value: 3 },
        { minute: 30, value: 4 }
      ]);
    });
  });

  describe('power demand', () => {
    const reducer = reducerFor(SeriesKind.POWER_DEMAND);

    it('marks fewer than four slots as a partial hour through the sample count', () => {
      const bucket = reducer.reduce({
        seriesId: 'power',
        hourStart: at('2024-03-01T10:00:00Z'),
        slots: [
          { minute: 0, value: 2 },
          { minute: 30, value: 4 }
        ],
        baseline: 0
      });

      expect(bucket).toEqual({
        kind: SeriesKind.POWER_DEMAND,
        seriesId: 'power',
        hourStart: at('2024-03-01T10:00:00Z'),
        slots: [
          { minute: 0, value: 2 },
          { minute: 30, value: 4 }
        ],
        sampleCount: 2,
        closed: false,
        min: 2,
        max: 4,
        mean: 3
      });
    });

    it('never narrows min and max of the persisted bucket', () => {
      const prior = powerBucket(powerSeries(), '2024-03-01T10:00:00Z', [[0, 1], [15, 5]], false);

      const bucket = reducer.reduce({
        seriesId: prior.seriesId,
        hourStart: prior.hourStart,
        slots: [
          { minute: 0, value: 2 },
          { minute: 15, value: 3 }
        ],
        prior,
        baseline: 0
      });

      expect([bucket.min, bucket.max, bucket.mean]).toEqual([1, 5, 2.5]);
    });
  });

  describe('energy consumption', () => {
    it('adds the hour sum to the predecessor cumulative sum', () => {
      const bucket = reducerFor(SeriesKind.ENERGY_CONSUMPTION).reduce({
        seriesId: 'energy',
        hourStart: at('2024-03-01T10:00:00Z'),
        slots: [{ minute: 0, value: 1.5 }],
        baseline: 10
      });

      expect([bucket.sum, bucket.mean, bucket.cumulativeSum, bucket.sampleCount]).toEqual([1.5, 1.5, 11.5, 1]);
    });
  });
});
