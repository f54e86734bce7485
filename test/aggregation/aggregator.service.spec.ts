import { Test } from '@nestjs/testing';
import { AggregatorService } from '../../src/aggregation/aggregator.service';
import { SeriesKind, SeriesState } from '../../src/aggregation/models/series.model';
import { LoggingService } from '../../src/common/logging.service';
import { at, energyBucket, energySeries, powerBucket, powerSeries, sample } from '../support/fixtures';

const EMPTY: SeriesState = { watermark: null, buckets: [] };

describe('AggregatorService', () => {
  let aggregator: AggregatorService;
  let logger: LoggingService;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [AggregatorService, LoggingService]
    }).compile();

    aggregator = moduleRef.get(AggregatorService);
    logger = moduleRef.get(LoggingService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('power demand', () => {
    const series = powerSeries({ lateArrivalMarginMinutes: 120 });

    it('reduces four quarter hours into one open bucket', () => {
      const result = aggregator.aggregate(series, EMPTY, [
        sample('2024-03-01T10:00:00Z', 2.0),
        sample('2024-03-01T10:15:00Z', 3.0),
        sample('2024-03-01T10:30:00Z', 2.5),
        sample('2024-03-01T10:45:00Z', 4.0)
      ]);

      expect(result.buckets).toEqual([
        {
          kind: SeriesKind.POWER_DEMAND,
          seriesId: series.id,
          hourStart: at('2024-03-01T10:00:00Z'),
          sampleCount: 4,
          closed: false,
          slots: [
            { minute: 0, value: 2.0 },
            { minute: 15, value: 3.0 },
            { minute: 30, value: 2.5 },
            { minute: 45, value: 4.0 }
          ],
          min: 2.0,
          max: 4.0,
          mean: 2.875
        }
      ]);
      expect(result.watermark).toBeNull();
      expect(result.misaligned).toBe(0);
      expect(result.late).toBe(0);
    });

    it('keeps the later of two samples with the same timestamp', () => {
      const result = aggregator.aggregate(series, EMPTY, [
        sample('2024-03-01T10:00:00Z', 1.0),
        sample('2024-03-01T10:00:00Z', 3.0)
      ]);

      expect(result.buckets).toHaveLength(1);
      expect(result.buckets[0].slots).toEqual([{ minute: 0, value: 3.0 }]);
      expect(result.buckets[0].sampleCount).toBe(1);
    });

    it('drops samples off the quarter hour grid', () => {
      const warn = jest.spyOn(logger, 'warn');

      const result = aggregator.aggregate(series, EMPTY, [
        sample('2024-03-01T10:00:00Z', 1.0),
        sample('2024-03-01T10:07:00Z', 9.0)
      ]);

      expect(result.misaligned).toBe(1);
      expect(result.buckets[0].slots).toEqual([{ minute: 0, value: 1.0 }]);
      expect(warn).toHaveBeenCalledWith(
        `Sample at 2024-03-01T10:07:00.000Z for series ${series.id} is not aligned to a 15 minute boundary`,
        AggregatorService.name
      );
    });

    it('merges fresh slots into an open persisted bucket and widens min and max', () => {
      const prior: SeriesState = {
        watermark: null,
        buckets: [powerBucket(series, '2024-03-01T10:00:00Z', [[0, 1.0], [15, 6.0]], false)]
      };

      const result = aggregator.aggregate(series, prior, [
        sample('2024-03-01T10:15:00Z', 3.0),
        sample('2024-03-01T10:30:00Z', 2.0)
      ]);

      expect(result.buckets).toHaveLength(1);
      const [bucket] = result.buckets;
      expect(bucket.slots).toEqual([
        { minute: 0, value: 1.0 },
        { minute: 15, value: 3.0 },
        { minute: 30, value: 2.0 }
      ]);
      expect(bucket.sampleCount).toBe(3);
      expect(bucket.mean).toBe(2.0);
      expect(bucket.kind === SeriesKind.POWER_DEMAND && [bucket.min, bucket.max]).toEqual([1.0, 6.0]);
    });
  });

  describe('closing and watermark', () => {
    const series = powerSeries({ lateArrivalMarginMinutes: 0 });

    it('closes an hour once a sample past its end plus the margin is observed', () => {
      const result = aggregator.aggregate(series, EMPTY, [
        sample('2024-03-01T10:00:00Z', 1.0),
        sample('2024-03-01T10:45:00Z', 1.0),
        sample('2024-03-01T11:00:00Z', 1.0)
      ]);

      expect(result.buckets.map((bucket) => [bucket.hourStart.toISOString(), bucket.closed])).toEqual([
        ['2024-03-01T10:00:00.000Z', true],
        ['2024-03-01T11:00:00.000Z', false]
      ]);
      expect(result.watermark).toEqual(at('2024-03-01T10:00:00Z'));
    });

    it('keeps an hour open while the margin has not elapsed', () => {
      const result = aggregator.aggregate(powerSeries({ lateArrivalMarginMinutes: 30 }), EMPTY, [
        sample('2024-03-01T10:00:00Z', 1.0),
        sample('2024-03-01T11:15:00Z', 1.0)
      ]);

      expect(result.buckets.every((bucket) => !bucket.closed)).toBe(true);
      expect(result.watermark).toBeNull();
    });

    it('stops the watermark at the first missing hour', () => {
      const result = aggregator.aggregate(series, EMPTY, [
        sample('2024-03-01T10:00:00Z', 1.0),
        sample('2024-03-01T12:00:00Z', 1.0),
        sample('2024-03-01T13:00:00Z', 1.0)
      ]);

      expect(result.buckets.map((bucket) => bucket.closed)).toEqual([true, true, false]);
      expect(result.watermark).toEqual(at('2024-03-01T10:00:00Z'));
    });

    it('discards samples for hours at or before the watermark', () => {
      const prior: SeriesState = {
        watermark: at('2024-03-01T10:00:00Z'),
        buckets: [powerBucket(series, '2024-03-01T10:00:00Z', [[0, 1.0]], true)]
      };

      const result = aggregator.aggregate(series, prior, [
        sample('2024-03-01T09:45:00Z', 5.0),
        sample('2024-03-01T10:30:00Z', 5.0),
        sample('2024-03-01T11:00:00Z', 2.0)
      ]);

      expect(result.late).toBe(2);
      expect(result.buckets.map((bucket) => bucket.hourStart.toISOString())).toEqual(['2024-03-01T11:00:00.000Z']);
      expect(result.watermark).toEqual(at('2024-03-01T10:00:00Z'));
    });

    it('leaves a bucket closed after a gap untouched by a late duplicate', () => {
      const closedAfterGap = powerBucket(series, '2024-03-01T11:00:00Z', [[0, 1.0], [15, 2.0]], true);
      const prior: SeriesState = {
        watermark: at('2024-03-01T09:00:00Z'),
        buckets: [powerBucket(series, '2024-03-01T09:00:00Z', [[0, 1.0]], true), closedAfterGap]
      };

      const result = aggregator.aggregate(series, prior, [
        sample('2024-03-01T11:15:00Z', 9.0),
        sample('2024-03-01T12:00:00Z', 1.0)
      ]);

      expect(result.late).toBe(1);
      expect(result.buckets.map((bucket) => bucket.hourStart.toISOString())).toEqual(['2024-03-01T12:00:00.000Z']);
      expect(result.watermark).toEqual(at('2024-03-01T09:00:00Z'));
      expect(closedAfterGap.slots).toEqual([
        { minute: 0, value: 1.0 },
        { minute: 15, value: 2.0 }
      ]);
    });

    it('walks the watermark over closed buckets once the gap before them is filled', () => {
      const prior: SeriesState = {
        watermark: at('2024-03-01T09:00:00Z'),
        buckets: [
          powerBucket(series, '2024-03-01T09:00:00Z', [[0, 1.0]], true),
          powerBucket(series, '2024-03-01T11:00:00Z', [[0, 2.0]], true),
          powerBucket(series, '2024-03-01T12:00:00Z', [[0, 3.0]], true)
        ]
      };

      const result = aggregator.aggregate(series, prior, [
        sample('2024-03-01T10:00:00Z', 4.0),
        sample('2024-03-01T10:15:00Z', 5.0),
        sample('2024-03-01T13:00:00Z', 6.0)
      ]);

      expect(result.buckets.map((bucket) => [bucket.hourStart.toISOString(), bucket.closed])).toEqual([
        ['2024-03-01T10:00:00.000Z', true],
        ['2024-03-01T13:00:00.000Z', false]
      ]);
      expect(result.watermark).toEqual(at('2024-03-01T12:00:00Z'));
      expect(result.late).toBe(0);
    });

    it('outputs nothing when the same samples are aggregated again', () => {
      const samples = [
        sample('2024-03-01T10:00:00Z', 1.0),
        sample('2024-03-01T10:15:00Z', 2.0),
        sample('2024-03-01T10:30:00Z', 3.0),
        sample('2024-03-01T10:45:00Z', 4.0),
        sample('2024-03-01T11:00:00Z', 5.0),
        sample('2024-03-01T11:15:00Z', 6.0)
      ];

      const first = aggregator.aggregate(series, EMPTY, samples);
      expect(first.watermark).toEqual(at('2024-03-01T10:00:00Z'));

      const second = aggregator.aggregate(series, { watermark: first.watermark, buckets: first.buckets }, samples);

      expect(second.buckets).toEqual([]);
      expect(second.watermark).toEqual(first.watermark);
      expect(second.late).toBe(4);
    });
  });

  describe('energy consumption', () => {
    const series = energySeries({ lateArrivalMarginMinutes: 0 });

    it('continues the cumulative sum from the bucket at the watermark', () => {
      const prior: SeriesState = {
        watermark: at('2024-03-01T09:00:00Z'),
        buckets: [energyBucket(series, '2024-03-01T09:00:00Z', 2, 100, true)]
      };

      const result = aggregator.aggregate(series, prior, [sample('2024-03-01T10:00:00Z', 5, 'kWh')]);

      expect(result.buckets).toEqual([
        {
          kind: SeriesKind.ENERGY_CONSUMPTION,
          seriesId: series.id,
          hourStart: at('2024-03-01T10:00:00Z'),
          sampleCount: 1,
          closed: false,
          slots: [{ minute: 0, value: 5 }],
          sum: 5,
          mean: 5,
          cumulativeSum: 105
        }
      ]);
      expect(result.watermark).toEqual(at('2024-03-01T09:00:00Z'));
    });

    it('closes an hour and advances the watermark when the next hour is observed', () => {
      const prior: SeriesState = {
        watermark: at('2024-03-01T09:00:00Z'),
        buckets: [energyBucket(series, '2024-03-01T09:00:00Z', 2, 100, true)]
      };

      const result = aggregator.aggregate(series, prior, [
        sample('2024-03-01T10:00:00Z', 5, 'kWh'),
        sample('2024-03-01T11:00:00Z', 1, 'kWh')
      ]);

      expect(
        result.buckets.map((bucket) => [
          bucket.hourStart.toISOString(),
          bucket.kind === SeriesKind.ENERGY_CONSUMPTION ? bucket.cumulativeSum : null,
          bucket.closed
        ])
      ).toEqual([
        ['2024-03-01T10:00:00.000Z', 105, true],
        ['2024-03-01T11:00:00.000Z', 106, false]
      ]);
      expect(result.watermark).toEqual(at('2024-03-01T10:00:00Z'));
    });

    it('keeps a bucket open while its predecessor hour is missing', () => {
      const result = aggregator.aggregate(series, EMPTY, [
        sample('2024-03-01T10:00:00Z', 1, 'kWh'),
        sample('2024-03-01T12:00:00Z', 2, 'kWh'),
        sample('2024-03-01T14:00:00Z', 3, 'kWh')
      ]);

      expect(
        result.buckets.map((bucket) => [
          bucket.closed,
          bucket.kind === SeriesKind.ENERGY_CONSUMPTION ? bucket.cumulativeSum : null
        ])
      ).toEqual([
        [true, 1],
        [false, 3],
        [false, 6]
      ]);
      expect(result.watermark).toEqual(at('2024-03-01T10:00:00Z'));
    });

    it('drops samples that are not on the hour', () => {
      const result = aggregator.aggregate(series, EMPTY, [
        sample('2024-03-01T10:00:00Z', 1, 'kWh'),
        sample('2024-03-01T10:15:00Z', 1, 'kWh')
      ]);

      expect(result.misaligned).toBe(1);
      expect(result.buckets).toHaveLength(1);
    });

    it('rejects a closed chain whose cumulative sum decreases', () => {
      const prior: SeriesState = {
        watermark: at('2024-03-01T10:00:00Z'),
        buckets: [
          energyBucket(series, '2024-03-01T09:00:00Z', 2, 100, true),
          energyBucket(series, '2024-03-01T10:00:00Z', 5, 90, true)
        ]
      };

      expect(() => aggregator.aggregate(series, prior, [sample('2024-03-01T11:00:00Z', 1, 'kWh')])).toThrow(
        'Cumulative sum of series LU-TEST-METERING-POINT_1-1:1.29.0_energy_hourly at 2024-03-01T10:00:00.000Z: ' +
          'persisted 90, expected 105'
      );
    });

    it('recomputes a stale open tail from the closed chain', () => {
      const prior: SeriesState = {
        watermark: at('2024-03-01T09:00:00Z'),
        buckets: [
          energyBucket(series, '2024-03-01T09:00:00Z', 2, 100, true),
          energyBucket(series, '2024-03-01T10:00:00Z', 6, 106, true),
          energyBucket(series, '2024-03-01T11:00:00Z', 1, 106, false)
        ]
      };

      const result = aggregator.aggregate(series, prior, [
        sample('2024-03-01T10:00:00Z', 6, 'kWh'),
        sample('2024-03-01T11:00:00Z', 1, 'kWh')
      ]);

      expect(
        result.buckets.map((bucket) => [
          bucket.hourStart.toISOString(),
          bucket.kind === SeriesKind.ENERGY_CONSUMPTION ? bucket.cumulativeSum : null,
          bucket.closed
        ])
      ).toEqual([['2024-03-01T11:00:00.000Z', 107, false]]);
      expect(result.watermark).toEqual(at('2024-03-01T10:00:00Z'));
      expect(result.late).toBe(1);
    });

    it('discards samples before the latest closed bucket even without a watermark', () => {
      const prior: SeriesState = {
        watermark: null,
        buckets: [energyBucket(series, '2024-03-01T10:00:00Z', 2, 2, true)]
      };

      const result = aggregator.aggregate(series, prior, [
        sample('2024-03-01T09:00:00Z', 4, 'kWh'),
        sample('2024-03-01T11:00:00Z', 1, 'kWh')
      ]);

      expect(result.late).toBe(1);
      expect(
        result.buckets.map((bucket) => [
          bucket.hourStart.toISOString(),
          bucket.kind === SeriesKind.ENERGY_CONSUMPTION ? bucket.cumulativeSum : null,
          bucket.closed
        ])
      ).toEqual([['2024-03-01T11:00:00.000Z', 3, false]]);
      expect(result.watermark).toEqual(at('2024-03-01T10:00:00Z'));
    });

    it('rejects a state whose watermark bucket is missing', () => {
      const prior: SeriesState = { watermark: at('2024-03-01T09:00:00Z'), buckets: [] };

      expect(() => aggregator.aggregate(series, prior, [])).toThrow(
        'Cumulative sum of series LU-TEST-METERING-POINT_1-1:1.29.0_energy_hourly at 2024-03-01T09:00:00.000Z: ' +
          'bucket at the watermark is missing'
      );
    });
  });
});
