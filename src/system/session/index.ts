export { createDashboardSession } from './session';
export type { DashboardSession, DashboardSessionOptions, PollOutcome, SessionStats } from './types';
