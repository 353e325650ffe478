import type { Logger } from '../ui/logger';

export function createRecordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  const record = (message: string) => {
    lines.push(message);
  };
  return { lines, info: record, success: record, warn: record, error: record };
}
