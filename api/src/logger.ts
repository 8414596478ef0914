// Colored console logger for service events; request lines go through Fastify's pino logger.

const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m'
};

type Level = 'debug' | 'info' | 'warn' | 'error';

const rank: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function threshold() {
  const lvl = process.env.LOG_LEVEL ?? 'info';
  if (lvl === 'silent') return Infinity;
  if (process.env.DEBUG) return rank.debug;
  return lvl === 'debug' || lvl === 'info' || lvl === 'warn' || lvl === 'error' ? rank[lvl] : rank.info;
}

function timestamp() {
  return new Date().toISOString().replace('T', ' ').slice(0, 19);
}

function formatMessage(label: string, color: string, prefix: string, msg: string, meta?: Record<string, unknown>) {
  const ts = `${colors.gray}${timestamp()}${colors.reset}`;
  const lvl = `${color}${label.padEnd(5)}${colors.reset}`;
  const pfx = `${colors.cyan}[${prefix}]${colors.reset}`;
  const metaStr = meta ? ` ${colors.dim}${JSON.stringify(meta)}${colors.reset}` : '';
  return `${ts} ${lvl} ${pfx} ${msg}${metaStr}`;
}

function emit(level: Level, label: string, color: string, prefix: string, msg: string, meta?: Record<string, unknown>) {
  if (rank[level] < threshold()) return;
  const line = formatMessage(label, color, prefix, msg, meta);
  if (level === 'error') console.error(line);
  else console.log(line);
}

export const logger = {
  info: (prefix: string, msg: string, meta?: Record<string, unknown>) => emit('info', 'INFO', colors.green, prefix, msg, meta),
  warn: (prefix: string, msg: string, meta?: Record<string, unknown>) => emit('warn', 'WARN', colors.yellow, prefix, msg, meta),
  error: (prefix: string, msg: string, meta?: Record<string, unknown>) => emit('error', 'ERROR', colors.red, prefix, msg, meta),
  debug: (prefix: string, msg: string, meta?: Record<string, unknown>) => emit('debug', 'DEBUG', colors.gray, prefix, msg, meta),
  success: (prefix: string, msg: string, meta?: Record<string, unknown>) =>
    emit('info', '✓', colors.green + colors.bright, prefix, msg, meta)
};

export default logger;
