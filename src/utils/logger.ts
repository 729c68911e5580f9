import { settings } from '../config/settings';

const RANK = { error: 0, warn: 1, info: 2, debug: 3 } as const;

type Level = keyof typeof RANK;

const enabled = (level: Level) => RANK[level] <= RANK[settings.LOG_LEVEL];

const log = (...args: unknown[]) => {
  if (enabled('debug')) console.log('[LOG]', ...args);
};
const info = (...args: unknown[]) => {
  if (enabled('info')) console.info('[INFO]', ...args);
};
const error = (...args: unknown[]) => console.error('[ERROR]', ...args);
const warn = (...args: unknown[]) => {
  if (enabled('warn')) console.warn('[WARN]', ...args);
};

export default { log, info, error, warn };
