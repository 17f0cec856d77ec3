/** Log level codes as sent by the server (1 = trace ... 5 = error). */
export type LogLevelCode = 0 | 1 | 2 | 3 | 4 | 5;

export type LogStreamType = 'unspecified' | 'stdout' | 'stderr';

export type LogEntryBody =
  | { type: 'log'; level: LogLevelCode; message: string }
  | { type: 'stream'; streamType: LogStreamType; payload: Uint8Array };

export interface LogEntry {
  createdAt?: number;
  runId?: string;
  entry?: LogEntryBody;
}
