import { HttpException, HttpStatus } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { DATABASE_TOKENS } from '../../src/common/database/database.constants';
import { FetchError, NonMonotonicCumulativeSumError } from '../../src/common/errors/ingestion.errors';
import { IngestionController } from '../../src/ingestion/ingestion.controller';
import { IngestionService, UnknownSeriesError } from '../../src/ingestion/ingestion.service';
import { RunOutcome, RunStatus } from '../../src/ingestion/models/ingestion.model';
import { InMemoryStatisticsDatabase } from '../support/in-memory-statistics.database';
import { at, energyBucket, energySeries, powerBucket, powerSeries } from '../support/fixtures';

async function statusOf(promise: Promise<unknown>): Promise<number> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof HttpException) {
      return error.getStatus();
    }
    throw error;
  }
  throw new Error('expected an HttpException');
}

describe('IngestionController', () => {
  const power = powerSeries();
  const energy = energySeries();

  let controller: IngestionController;
  let store: InMemoryStatisticsDatabase;
  let ingestion: {
    runNow: jest.Mock<Promise<RunOutcome>, [string]>;
    resume: jest.Mock;
    requireSeries: jest.Mock;
  };

  beforeEach(async () => {
    ingestion = {
      runNow: jest.fn<Promise<RunOutcome>, [string]>(),
      resume: jest.fn(),
      requireSeries: jest.fn((seriesId: string) => {
        const series = [power, energy].find((definition) => definition.id === seriesId);
        if (!series) {
          throw new UnknownSeriesError(seriesId);
        }
        return series;
      })
    };
    store = new InMemoryStatisticsDatabase();
    const moduleRef = await Test.createTestingModule({
      controllers: [IngestionController],
      providers: [
        { provide: IngestionService, useValue: ingestion },
        { provide: DATABASE_TOKENS.STATISTICS_DATABASE, useValue: store }
      ]
    }).compile();

    controller = moduleRef.get(IngestionController);
  });

  describe('getStatistics', () => {
    it('returns the stored buckets of the range without their slots', async () => {
      await store.merge(
        power.id,
        [
          powerBucket(power, '2024-03-01T09:00:00Z', [[0, 1]], true),
          powerBucket(power, '2024-03-01T10:00:00Z', [[0, 2], [15, 4]], false)
        ],
        null
      );

      const statistics = await controller.getStatistics(power.id, '2024-03-01T10:00:00Z', '2024-03-01T11:00:00Z');

      expect(statistics).toEqual([
        {
          hourStart: '2024-03-01T10:00:00.000Z',
          kind: power.kind,
          closed: false,
          sampleCount: 2,
          mean: 3,
          min: 2,
          max: 4
        }
      ]);
    });

    it('returns energy sums', async () => {
      await store.merge(energy.id, [energyBucket(energy, '2024-03-01T10:00:00Z', 1.5, 11.5, true)], null);

      const [statistic] = await controller.getStatistics(energy.id, '2024-03-01T00:00:00Z', '2024-03-02T00:00:00Z');

      expect(statistic).toMatchObject({ sum: 1.5, cumulativeSum: 11.5, closed: true });
    });

    it('rejects an unknown series', async () => {
      expect(await statusOf(controller.getStatistics('unknown'))).toBe(HttpStatus.NOT_FOUND);
    });

    it.each([
      ['an invalid date', 'yesterday', '2024-03-01T00:00:00Z'],
      ['a reversed range', '2024-03-02T00:00:00Z', '2024-03-01T00:00:00Z'],
      ['a range above one year', '2022-01-01T00:00:00Z', '2024-01-01T00:00:00Z']
    ])('rejects %s', async (_label, from, to) => {
      expect(await statusOf(controller.getStatistics(power.id, from, to))).toBe(HttpStatus.BAD_REQUEST);
    });
  });

  describe('run', () => {
    it('returns the run report', async () => {
      const report = {
        seriesId: power.id,
        from: at('2024-03-01T00:00:00Z'),
        to: at('2024-03-01T12:00:00Z'),
        fetched: 4,
        changed: 1,
        misaligned: 0,
        late: 0,
        watermark: null,
        durationMs: 12
      };
      ingestion.runNow.mockResolvedValue({ ok: true, report });

      await expect(controller.run(power.id)).resolves.toMatchObject({ success: true, report });
    });

    it.each([
      ['a permanent fetch error', new FetchError('permanent', 'Metering API error: 401 Unauthorized', 401), 502],
      ['a transient fetch error', new FetchError('transient', 'Metering API error: 503', 503), 503],
      ['a broken cumulative chain', new NonMonotonicCumulativeSumError(energy.id, at('2024-03-01T10:00:00Z'), 'x'), 409],
      ['an unexpected error', new Error('boom'), 500]
    ])('maps %s', async (_label, error, status) => {
      const state = {
        status: RunStatus.RETRYING,
        attempt: 1,
        nextEligibleAt: at('2024-03-01T12:01:00Z'),
        lastError: error.message,
        lastErrorCode: null,
        lastSuccessAt: null,
        fingerprint: 'fingerprint'
      };
      ingestion.runNow.mockResolvedValue({ ok: false, error, state });

      expect(await statusOf(controller.run(power.id))).toBe(status);
    });
  });

  describe('resume', () => {
    it('maps an unknown series to 404', () => {
      ingestion.resume.mockImplementation((seriesId: string) => {
        throw new UnknownSeriesError(seriesId);
      });

      expect(() => controller.resume('unknown')).toThrow(HttpException);
    });
  });
});
