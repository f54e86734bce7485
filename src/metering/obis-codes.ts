import { ObisCodeInfo } from './models/metering.model';

export const DEFAULT_OBIS_CODE = '1-1:1.29.0';

const active = (
  code: string,
  description: string,
  serviceType: ObisCodeInfo['serviceType']
): ObisCodeInfo => ({ code, description, serviceType, powerUnit: 'kW', energyUnit: 'kWh' });

const reactive = (
  code: string,
  description: string,
  serviceType: ObisCodeInfo['serviceType']
): ObisCodeInfo => ({ code, description, serviceType, powerUnit: 'kVAR', energyUnit: 'kVARh' });

/**
 * OBIS codes published by the metering provider for 15 minute load profiles
 */
export const OBIS_CODES: ReadonlyMap<string, ObisCodeInfo> = new Map(
  [
    active('1-1:1.29.0', 'Active Consumption', 'Consumption'),
    active('1-1:2.29.0', 'Active Production', 'Production'),
    reactive('1-1:3.29.0', 'Reactive Consumption', 'Consumption'),
    reactive('1-1:4.29.0', 'Reactive Production', 'Production'),
    active('1-65:1.29.1', 'Consumption Covered by Sharing Group Layer 1', 'Consumption'),
    active('1-65:1.29.3', 'Consumption Covered by Sharing Group Layer 2', 'Consumption'),
    active('1-65:1.29.4', 'Consumption Covered by Sharing Group Layer 3', 'Consumption'),
    active('1-65:1.29.2', 'Consumption Covered by Sharing Group Layer 4', 'Consumption'),
    active('1-65:1.29.9', 'Remaining Consumption after Sharing', 'Consumption'),
    active('1-65:2.29.1', 'Production Shared with Sharing Group Layer 1', 'Production'),
    active('1-65:2.29.3', 'Production Shared with Sharing Group Layer 2', 'Production'),
    active('1-65:2.29.4', 'Production Shared with Sharing Group Layer 3', 'Production'),
    active('1-65:2.29.2', 'Production Shared with Sharing Group Layer 4', 'Production'),
    active('1-65:2.29.9', 'Remaining Production after Sharing', 'Production')
  ].map((info) => [info.code, info])
);

export function findObisCode(code: string): ObisCodeInfo | undefined {
  return OBIS_CODES.get(code);
}
