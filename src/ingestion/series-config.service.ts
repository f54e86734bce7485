import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import * as fs from 'fs';
import _ from 'lodash';
import { LoggingService } from '../common/logging.service';
import { errorMessage } from '../common/errors/ingestion.errors';
import { Constants } from '../constants';
import { SeriesDefinition, SeriesKind } from '../aggregation/models/series.model';
import { findObisCode } from '../metering/obis-codes';
import { SeriesConfigEntry } from './models/ingestion.model';

export class InvalidSeriesConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = InvalidSeriesConfigError.name;
  }
}

/**
 * Defaults applied to every series, from the environment
 */
export interface SeriesSettings {
  meteringPoint: string;
  energyId: string;
  obisCodes: string[];
  lateArrivalMarginMinutes: number;
  pollIntervalMinutes: number;
  startOfHistory: Date | null;
}

const KIND_SUFFIX: Readonly<Record<SeriesKind, string>> = {
  [SeriesKind.POWER_DEMAND]: 'pwr_hourly',
  [SeriesKind.ENERGY_CONSUMPTION]: 'energy_hourly'
};

/**
 * The OBIS code and kind are always part of the id, so changing either defines a new series
 * @param prefix - Metering point, or the explicit id of a series file entry
 */
export function buildSeriesId(prefix: string, obisCode: string, kind: SeriesKind): string {
  return `${prefix}_${obisCode}_${KIND_SUFFIX[kind]}`;
}

/**
 * Every OBIS code yields a power demand and an energy consumption series
 */
export function buildSeriesFromSettings(settings: SeriesSettings): SeriesDefinition[] {
  const series = settings.obisCodes.flatMap((obisCode) =>
    [SeriesKind.POWER_DEMAND, SeriesKind.ENERGY_CONSUMPTION].map((kind) =>
      defineSeries(settings, { obisCode, kind }, settings.obisCodes.indexOf(obisCode))
    )
  );
  return validateSeries(series);
}

/**
 * Parses a series file of the form { "series": [SeriesConfigEntry, ...] }.
 * Missing fields fall back to the settings.
 */
export function parseSeriesFile(content: string, settings: SeriesSettings): SeriesDefinition[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new InvalidSeriesConfigError(`Series file is not valid JSON: ${errorMessage(error)}`);
  }

  const entries = isRecord(parsed) ? parsed.series : undefined;
  if (!Array.isArray(entries) || entries.length === 0) {
    throw new InvalidSeriesConfigError('Series file must contain a non-empty "series" array');
  }

  return validateSeries(entries.map((entry: unknown, index) => defineSeries(settings, toEntry(entry, index), index)));
}

/**
 * Identity of everything that changes what a series fetches or how it aggregates
 */
export function seriesFingerprint(series: SeriesDefinition): string {
  return JSON.stringify([
    series.meteringPoint,
    series.energyId,
    series.obisCode,
    series.kind,
    series.lateArrivalMarginMinutes,
    series.pollIntervalMinutes,
    series.startOfHistory?.toISOString() ?? null
  ]);
}

function defineSeries(settings: SeriesSettings, entry: SeriesConfigEntry, index: number): SeriesDefinition {
  const obis = findObisCode(entry.obisCode);
  if (!obis) {
    throw new InvalidSeriesConfigError(`Series #${index}: unknown OBIS code ${entry.obisCode}`);
  }

  const meteringPoint = entry.meteringPoint ?? settings.meteringPoint;
  const energyId = entry.energyId ?? settings.energyId;
  if (!meteringPoint || !energyId) {
    throw new InvalidSeriesConfigError(`Series #${index}: metering point and energy id are required`);
  }

  const startOfHistory = entry.startOfHistory ? new Date(entry.startOfHistory) : settings.startOfHistory;
  if (startOfHistory && Number.isNaN(startOfHistory.getTime())) {
    throw new InvalidSeriesConfigError(`Series #${index}: invalid startOfHistory ${entry.startOfHistory}`);
  }

  const isPower = entry.kind === SeriesKind.POWER_DEMAND;
  return {
    id: buildSeriesId(entry.id ?? meteringPoint, obis.code, entry.kind),
    name: entry.name ?? `${obis.description} ${isPower ? 'power' : 'energy'}`,
    meteringPoint,
    energyId,
    obisCode: obis.code,
    kind: entry.kind,
    unit: entry.unit ?? (isPower ? obis.powerUnit : obis.energyUnit),
    lateArrivalMarginMinutes: entry.lateArrivalMarginMinutes ?? settings.lateArrivalMarginMinutes,
    pollIntervalMinutes: entry.pollIntervalMinutes ?? settings.pollIntervalMinutes,
    startOfHistory
  };
}

function validateSeries(series: SeriesDefinition[]): SeriesDefinition[] {
  for (const definition of series) {
    if (!Number.isFinite(definition.lateArrivalMarginMinutes) || definition.lateArrivalMarginMinutes < 0) {
      throw new InvalidSeriesConfigError(`Series ${definition.id}: lateArrivalMarginMinutes must be >= 0`);
    }
    if (!Number.isFinite(definition.pollIntervalMinutes) || definition.pollIntervalMinutes <= 0) {
      throw new InvalidSeriesConfigError(`Series ${definition.id}: pollIntervalMinutes must be > 0`);
    }
  }

  const duplicates = _(series)
    .countBy((definition) => definition.id)
    .pickBy((count) => count > 1)
    .keys()
    .value();
  if (duplicates.length > 0) {
    throw new InvalidSeriesConfigError(`Duplicate series ids: ${duplicates.join(', ')}`);
  }

  return series;
}

function toEntry(value: unknown, index: number): SeriesConfigEntry {
  if (!isRecord(value)) {
    throw new InvalidSeriesConfigError(`Series #${index} must be an object`);
  }

  const kind = value.kind;
  if (kind !== SeriesKind.POWER_DEMAND && kind !== SeriesKind.ENERGY_CONSUMPTION) {
    throw new InvalidSeriesConfigError(
      `Series #${index}: kind must be ${SeriesKind.POWER_DEMAND} or ${SeriesKind.ENERGY_CONSUMPTION}`
    );
  }
  if (typeof value.obisCode !== 'string') {
    throw new InvalidSeriesConfigError(`Series #${index}: obisCode is required`);
  }

  return {
    obisCode: value.obisCode,
    kind,
    id: optionalString(value, 'id', index),
    name: optionalString(value, 'name', index),
    meteringPoint: optionalString(value, 'meteringPoint', index),
    energyId: optionalString(value, 'energyId', index),
    unit: optionalString(value, 'unit', index),
    startOfHistory: optionalString(value, 'startOfHistory', index),
    lateArrivalMarginMinutes: optionalNumber(value, 'lateArrivalMarginMinutes', index),
    pollIntervalMinutes: optionalNumber(value, 'pollIntervalMinutes', index)
  };
}

function optionalString(entry: Record<string, unknown>, key: string, index: number): string | undefined {
  const value = entry[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    throw new InvalidSeriesConfigError(`Series #${index}: ${key} must be a non-empty string`);
  }
  return value.trim();
}

function optionalNumber(entry: Record<string, unknown>, key: string, index: number): number | undefined {
  const value = entry[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidSeriesConfigError(`Series #${index}: ${key} must be a number`);
  }
  return value;
}

/**
 * Reads INGESTION_START_OF_HISTORY; unset means the initial lookback applies
 */
export function parseStartOfHistory(raw: string): Date | null {
  if (!raw) {
    return null;
  }
  const date = new Date(raw);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidSeriesConfigError(`INGESTION_START_OF_HISTORY is not a valid date: ${raw}`);
  }
  return date;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Provides the configured series, from SERIES_CONFIG_FILE when set, otherwise from
 * the metering point and OBIS codes of the environment
 */
@Injectable()
export class SeriesConfigService implements OnModuleInit {
  private readonly context = SeriesConfigService.name;

  @Inject(LoggingService) private readonly logger!: LoggingService;

  private series: SeriesDefinition[] = [];

  public onModuleInit(): void {
    this.reload();
  }

  /**
   * Re-reads the configuration; an invalid configuration keeps the previous series
   */
  public reload(): SeriesDefinition[] {
    const file = Constants.SERIES.CONFIG_FILE;

    try {
      const settings: SeriesSettings = {
        meteringPoint: Constants.METERING.METERING_POINT,
        energyId: Constants.METERING.ENERGY_ID,
        obisCodes: Constants.METERING.OBIS_CODES,
        lateArrivalMarginMinutes: Constants.INGESTION.LATE_ARRIVAL_MARGIN_MINUTES,
        pollIntervalMinutes: Constants.INGESTION.POLL_INTERVAL_MINUTES,
        startOfHistory: parseStartOfHistory(Constants.INGESTION.START_OF_HISTORY)
      };
      this.series = file ? parseSeriesFile(fs.readFileSync(file, 'utf8'), settings) : buildSeriesFromSettings(settings);
    } catch (error) {
      this.logger.error(`Invalid series configuration${file ? ` in ${file}` : ''}`, error, this.context);
      throw error;
    }

    this.logger.log(
      `Configured ${this.series.length} series: ${this.series.map((definition) => definition.id).join(', ')}`,
      this.context
    );
    return this.series;
  }

  public getSeries(): SeriesDefinition[] {
    return this.series;
  }

  public findSeries(seriesId: string): SeriesDefinition | undefined {
    return this.series.find((definition) => definition.id === seriesId);
  }
}
