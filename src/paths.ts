import path from 'path';
import { env } from './env';

export interface DataPaths {
  credentialsFile: string;
  timerFile: string;
  logFile: string;
  browserProfileDir: string;
}

export const resolveDataPaths = (home: string): DataPaths => ({
  credentialsFile: path.join(home, '.payroll_punch_config.json'),
  timerFile: path.join(home, '.payroll_punch_timer.json'),
  logFile: path.join(home, '.payroll_punch.log'),
  browserProfileDir: path.join(home, '.payroll_punch_browser_profile')
});

export const dataPaths = resolveDataPaths(env.PUNCH_HOME);
