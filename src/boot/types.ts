import type { ConsoleAPI, LineStream, Logger } from '@logging';
import type { DashboardSession } from '@system/session';
import type { Transport } from '@transport';
import type { Clock, DashboardConfig, FetchFn, TimerAPI } from '$types';

export type { InitMessage } from '@logging';

/**
 * Host services the dashboard is wired to
 * Defaults come from createDefaultDependencies(); tests pass doubles
 */
export interface InitDependencies {
  fetchFn: FetchFn;
  clock: Clock;
  timer: TimerAPI;
  consoleApi: ConsoleAPI;
  openStream: (path: string) => LineStream;
}

/**
 * Wired dashboard
 */
export interface Dashboard {
  config: DashboardConfig;
  logger: Logger;
  transport: Transport;
  session: DashboardSession;
  /** Drain buffered log output and close the log file */
  shutdown(): void;
}
