/**
 * Briefing API context types
 */
import type { BriefingLogger, MeetingSession } from '@meeting-briefing/agents';

export interface AppVariables {
  requestId: string;
  logger: BriefingLogger;
  session: MeetingSession;
}

export interface AppEnv {
  Variables: AppVariables;
}
