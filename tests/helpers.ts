import type { Reporter } from '../src/reporter.js';

export type RecordingReporter = Reporter & {
  messages: Record<keyof Reporter, string[]>;
};

export function createRecordingReporter(): RecordingReporter {
  const messages: Record<keyof Reporter, string[]> = {
    info: [],
    warn: [],
    ok: [],
    skip: [],
    dryRun: [],
    error: []
  };
  return {
    messages,
    info: message => messages.info.push(message),
    warn: message => messages.warn.push(message),
    ok: message => messages.ok.push(message),
    skip: message => messages.skip.push(message),
    dryRun: message => messages.dryRun.push(message),
    error: message => messages.error.push(message)
  };
}
