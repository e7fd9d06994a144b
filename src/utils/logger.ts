const COLORS = {
  reset: '\x1b[0m',
  gray: '\x1b[90m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
};

type Level = 'info' | 'warn' | 'error' | 'silent';

const RANK: Record<Level, number> = { info: 0, warn: 1, error: 2, silent: 3 };

function threshold(): Level {
  const raw = process.env.LOG_LEVEL;
  if (raw === 'warn' || raw === 'error' || raw === 'silent') return raw;
  return 'info';
}

function enabled(level: Exclude<Level, 'silent'>): boolean {
  return RANK[level] >= RANK[threshold()];
}

function ts(): string {
  const d = new Date();
  return d.toISOString();
}

// bigint is not JSON-serializable; print it as a decimal string.
function replacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

function line(prefix: string, message: string) {
  // eslint-disable-next-line no-console
  console.log(`${COLORS.gray}[${ts()}]${COLORS.reset} ${prefix} ${message}`);
}

export const logger = {
  info(message: string) {
    if (enabled('info')) line(`${COLORS.cyan}INFO${COLORS.reset}`, message);
  },
  warn(message: string) {
    if (enabled('warn')) line(`${COLORS.yellow}WARN${COLORS.reset}`, message);
  },
  error(message: string) {
    if (enabled('error')) line(`${COLORS.red}ERROR${COLORS.reset}`, message);
  },
  section(title: string) {
    if (!enabled('info')) return;
    const bar = `${COLORS.magenta}==============================${COLORS.reset}`;
    // eslint-disable-next-line no-console
    console.log(`${bar}\n${COLORS.magenta}${title}${COLORS.reset}\n${bar}`);
  },
  json(title: string, obj: unknown) {
    this.info(`${title}:\n${COLORS.gray}${JSON.stringify(obj, replacer, 2)}${COLORS.reset}`);
  },
};
