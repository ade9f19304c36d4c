import { Chalk, type ChalkInstance } from 'chalk';
import { LOG_LEVELS, type LogLevel } from '../types/Core';

// Log message type
export interface LogMessage {
  readonly level: Exclude<LogLevel, 'SILENT'>;
  readonly component: string;
  readonly message: string;
  readonly data?: unknown;
  readonly timestamp: number;
}

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  readonly level?: LogLevel;
  readonly colors?: boolean;
  readonly sink?: LogSink;
  readonly clock?: () => number;
}

export interface Logger {
  readonly debug: (message: string, data?: unknown) => void;
  readonly info: (message: string, data?: unknown) => void;
  readonly warn: (message: string, data?: unknown) => void;
  readonly error: (message: string, data?: unknown) => void;
  readonly block: (height: number, additions: number, removals: number) => void;
  readonly transaction: (bundleName: string, status: string, cost: bigint) => void;
}

const createColors = (chalk: ChalkInstance) => ({
  DEBUG: chalk.gray.dim,
  INFO: chalk.cyan,
  WARN: chalk.yellow,
  ERROR: chalk.red,
  MUTED: chalk.gray,
  COMPONENT: chalk.blue,
  HASH: chalk.yellow,
  BLOCK: chalk.magenta,
  TRANSACTION: chalk.green,
  TIMESTAMP: chalk.gray,
  SEPARATOR: chalk.gray,
});

// Only show minutes:seconds
const formatTimestamp = (timestamp: number): string => {
  const time = new Date(timestamp).toISOString().split('T')[1].split('.')[0];
  return time.split(':').slice(1).join(':');
};

const shortHash = (hash: string): string => hash.substring(0, 8);

// BigInt amounts are printed as decimal strings
const jsonReplacer = (_key: string, value: unknown): unknown =>
  typeof value === 'bigint' ? value.toString() : value;

const severity = (level: LogLevel): number => LOG_LEVELS.indexOf(level);

export const createLogger = (component: string = 'LEDGER', options: LoggerOptions = {}): Logger => {
  const {
    level: minLevel = 'INFO',
    colors = true,
    sink = (line: string) => console.log(line),
    clock = Date.now
  } = options;
  const COLORS = createColors(colors ? new Chalk() : new Chalk({ level: 0 }));

  const formatMessage = (message: string): string =>
    message
      .replace(/#(\d+)/g, (_, num: string) => COLORS.BLOCK(`#${num}`))
      .replace(/\b[a-f0-9]{64}\b/g, hash => COLORS.HASH(shortHash(hash)));

  const log = (entry: LogMessage): void => {
    if (severity(entry.level) < severity(minLevel)) {
      return;
    }
    const formattedTimestamp = COLORS.TIMESTAMP(`[${formatTimestamp(entry.timestamp)}]`);
    const formattedLevel = COLORS[entry.level](entry.level.padEnd(5));
    const formattedComponent = COLORS.COMPONENT(`[${entry.component}]`);
    sink(`${formattedTimestamp} ${formattedLevel} ${formattedComponent} ${formatMessage(entry.message)}`);

    if (entry.data !== undefined) {
      const dataStr = typeof entry.data === 'object'
        ? JSON.stringify(entry.data, jsonReplacer, 2)
        : String(entry.data);
      if (dataStr.length < 80) {
        sink(`${COLORS.MUTED('  └')} ${dataStr.replace(/\s*\n\s*/g, ' ')}`);
      } else {
        const formattedData = dataStr
          .split('\n')
          .map(line => '    ' + line)
          .join('\n');
        sink(`${COLORS.MUTED('  └ Data:')}\n${formattedData}`);
      }
    }
  };

  const at = (level: LogMessage['level']) => (message: string, data?: unknown): void =>
    log({ level, component, message, data, timestamp: clock() });

  return {
    debug: at('DEBUG'),
    info: at('INFO'),
    warn: at('WARN'),
    error: at('ERROR'),
    block: (height, additions, removals) =>
      at('INFO')(`BLOCK #${height} farmed ${COLORS.SEPARATOR('|')} +${additions} -${removals}`),
    transaction: (bundleName, status, cost) =>
      at('INFO')(`${COLORS.TRANSACTION('TX')} ${bundleName} ${COLORS.SEPARATOR('|')} ${status} cost ${cost}`),
  };
};

export const silentLogger: Logger = createLogger('SILENT', { level: 'SILENT', colors: false });
