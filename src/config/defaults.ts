import type { ControlScoreConfig } from './schema.js';
import type { ServiceWeightTable } from '../scoring/types.js';

export function getDefaultConfig(): ControlScoreConfig {
  return {
    logLevel: 'info',
    json: false,
    strict: false,
    threshold: 0,
  };
}

// Used when no service weights file is configured
export const DEFAULT_SERVICE_WEIGHTS: ServiceWeightTable = Object.freeze({
  gmail: 0.2,
  drive: 0.2,
  common: 0.2,
  groups: 0.1,
  chat: 0.1,
  meet: 0.05,
  calendar: 0.05,
  classroom: 0.05,
  sites: 0.05,
});
