import { v4 as uuidv4 } from 'uuid';

/** Correlation id attached to the log lines of one dispatched tool call. */
export function generateCallId(operation: string): string {
  return `${operation}:${uuidv4()}`;
}
