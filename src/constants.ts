import _ from 'lodash';
import { DEFAULT_OBIS_CODE } from './metering/obis-codes';

/**
 * Numeric variable, or the fallback when unset, not finite or below the minimum
 */
function envNumber(name: string, fallback: number, options: { allowZero?: boolean } = {}): number {
  const raw = process.env[name]?.trim();
  const value = raw ? _.toNumber(raw) : NaN;
  const inRange = options.allowZero ? value >= 0 : value > 0;
  return Number.isFinite(value) && inRange ? value : fallback;
}

/**
 * All Application Constants for the metering statistics service
 */
export class Constants {
  /**
   * Metering provider API Configuration
   */
  public static METERING = {
    get API_BASE_URL(): string {
      return process.env.METERING_API_BASE_URL || 'https://api.leneda.eu/api';
    },

    get API_KEY(): string {
      return process.env.METERING_API_KEY || '';
    },

    get ENERGY_ID(): string {
      return process.env.METERING_ENERGY_ID || '';
    },

    get METERING_POINT(): string {
      return process.env.METERING_POINT || '';
    },

    /**
     * Comma separated list, every code yields one power and one energy series
     */
    get OBIS_CODES(): string[] {
      const raw = process.env.METERING_OBIS_CODES || DEFAULT_OBIS_CODE;
      return _.uniq(
        raw
          .split(',')
          .map((code) => code.trim())
          .filter((code) => code.length > 0)
      );
    },

    get REQUEST_TIMEOUT_MS(): number {
      return envNumber('METERING_REQUEST_TIMEOUT_MS', 30000);
    },

    get MAX_DAYS_PER_REQUEST(): number {
      return envNumber('METERING_MAX_DAYS_PER_REQUEST', 30);
    },

    get CLOCK_SKEW_MINUTES(): number {
      return envNumber('METERING_CLOCK_SKEW_MINUTES', 5, { allowZero: true });
    }
  };

  /**
   * Series definitions
   */
  public static SERIES = {
    /**
     * Optional JSON file with explicit series entries, replaces the env derived series
     */
    get CONFIG_FILE(): string {
      return process.env.SERIES_CONFIG_FILE || '';
    }
  };

  /**
   * Ingestion scheduling Configuration
   */
  public static INGESTION = {
    get POLL_INTERVAL_MINUTES(): number {
      return envNumber('INGESTION_POLL_INTERVAL_MINUTES', 120);
    },

    get LATE_ARRIVAL_MARGIN_MINUTES(): number {
      return envNumber('INGESTION_LATE_ARRIVAL_MARGIN_MINUTES', 120, { allowZero: true });
    },

    get INITIAL_DAYS_TO_FETCH(): number {
      return envNumber('INGESTION_INITIAL_DAYS_TO_FETCH', 180);
    },

    /**
     * ISO date, validated with the series configuration
     */
    get START_OF_HISTORY(): string {
      return process.env.INGESTION_START_OF_HISTORY?.trim() || '';
    },

    get RUN_TIMEOUT_MS(): number {
      return envNumber('INGESTION_RUN_TIMEOUT_MS', 120000);
    },

    get MAX_RETRIES(): number {
      return envNumber('INGESTION_MAX_RETRIES', 5, { allowZero: true });
    },

    get RETRY_INITIAL_DELAY_MS(): number {
      return envNumber('INGESTION_RETRY_INITIAL_DELAY_MS', 60000, { allowZero: true }); // 1 minute
    },

    get RETRY_MAX_DELAY_MS(): number {
      return envNumber('INGESTION_RETRY_MAX_DELAY_MS', 1800000, { allowZero: true }); // 30 minutes
    }
  };

  /**
   * Logging Configuration
   */
  public static LOGGING = {
    get LOG_DIR(): string {
      return process.env.LOG_DIR || 'logs';
    },

    get APP_NAME(): string {
      return process.env.APP_NAME || 'metering-statistics';
    },

    get LOG_LEVEL(): string {
      return process.env.LOG_LEVEL?.toUpperCase() || 'INFO';
    }
  };

  /**
   * Database Configuration
   */
  public static DATABASE = {
    get TYPE(): string {
      return process.env.DATABASE_TYPE || 'mongodb';
    },

    get MONGODB_URI(): string {
      return process.env.MONGODB_URI || 'mongodb://localhost:27017/metering-statistics';
    },

    get COUCHDB_URL(): string {
      return process.env.COUCHDB_URL || 'http://localhost:5984';
    }
  };

  /**
   * Server Configuration
   */
  public static SERVER = {
    get PORT(): number {
      return envNumber('PORT', 3000);
    },

    get NODE_ENV(): string {
      return process.env.NODE_ENV || 'development';
    }
  };

  /**
   * API Security Configuration
   */
  public static API = {
    get KEY(): string {
      return process.env.API_KEY || '';
    }
  };
}
