/**
 * Configuration transformer - converts a discovery Configuration into the JSON shape
 * printed by the CLI and returned by the MCP tool.
 */
import type { Configuration } from '../discovery/types.js';

/** Placeholder shown instead of a password */
export const REDACTED = '********';

/**
 * Configuration as shown to users: password masked, diagnostic log split into lines.
 */
export interface ConfigurationSummary extends Omit<Configuration, 'password' | 'diagnosticLog'> {
  password: string | null;
  diagnosticLog: string[];
}

/**
 * Transform a Configuration for display.
 * A password that was given is replaced by REDACTED; a missing one stays null.
 */
export function transformConfiguration(config: Configuration): ConfigurationSummary {
  return {
    userName: config.userName,
    password: config.password === null ? null : REDACTED,
    preemptiveAuth: config.preemptiveAuth,
    calendarService: config.calendarService,
    contactsService: config.contactsService,
    diagnosticLog: config.diagnosticLog === '' ? [] : config.diagnosticLog.split('\n'),
  };
}

/** Whether discovery found anything at all */
export function hasAnyService(config: Configuration): boolean {
  return config.calendarService !== null || config.contactsService !== null;
}
