import { join } from 'path';
import { getEnvConfig } from './env';

export interface DataPaths {
  root: string;
  alerts: string;
  earnings: string;
  settings: string;
  coveredCalls: string;
  positions: string;
  historyDir: string;
  routinesDir: string;
}

export function getDataPaths(dataDir: string = getEnvConfig().dataDir): DataPaths {
  return {
    root: dataDir,
    alerts: join(dataDir, 'alerts.json'),
    earnings: join(dataDir, 'earnings.json'),
    settings: join(dataDir, 'settings.json'),
    coveredCalls: join(dataDir, 'covered_calls.json'),
    positions: join(dataDir, 'positions.json'),
    historyDir: join(dataDir, 'history'),
    routinesDir: join(dataDir, 'routines'),
  };
}
