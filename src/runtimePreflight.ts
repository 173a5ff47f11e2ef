import { isValidTimeZone } from './calendar';

export interface RuntimePreflightOptions {
  allowNonProd?: boolean;
  allowMemoryInProduction?: boolean;
}

const CONSUMPTION_ORDERS = ['purchased-first', 'recurring-first'];
const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isBlank(value: string | undefined): boolean {
  return !value || value.trim().length === 0;
}

function checkPositiveInt(env: NodeJS.ProcessEnv, key: string, errors: string[]): void {
  const raw = env[key]?.trim();
  if (isBlank(raw)) {
    return;
  }
  if (!/^\d+$/.test(raw ?? '') || Number(raw) < 1) {
    errors.push(`${key}=${raw} is invalid, expected a positive integer`);
  }
}

export function shouldRunRuntimePreflight(env: NodeJS.ProcessEnv): boolean {
  return env.ENABLE_RUNTIME_PREFLIGHT === '1' || env.NODE_ENV === 'production';
}

export function validateRuntimeEnv(
  env: NodeJS.ProcessEnv,
  options: RuntimePreflightOptions = {}
): string[] {
  const errors: string[] = [];
  const allowNonProd = options.allowNonProd ?? false;
  const allowMemoryInProduction = options.allowMemoryInProduction ?? false;

  const nodeEnv = env.NODE_ENV?.trim();
  if (isBlank(nodeEnv)) {
    errors.push('NODE_ENV is not set');
  } else if (nodeEnv !== 'production' && !allowNonProd) {
    errors.push(`NODE_ENV=${nodeEnv} is not production (set ALLOW_NON_PROD=1 to skip)`);
  }

  const storageDriver = env.STORAGE_DRIVER?.trim();
  if (isBlank(storageDriver)) {
    errors.push('STORAGE_DRIVER is not set, expected postgres or memory');
  } else if (storageDriver !== 'postgres' && storageDriver !== 'memory') {
    errors.push(`STORAGE_DRIVER=${storageDriver} is invalid, expected postgres or memory`);
  }

  if (storageDriver === 'memory' && nodeEnv === 'production' && !allowMemoryInProduction) {
    errors.push(
      'memory storage loses streak and shield state on restart (set ALLOW_MEMORY_IN_PRODUCTION=1 to skip)'
    );
  }

  if (storageDriver === 'postgres') {
    const databaseUrl = env.DATABASE_URL?.trim();
    if (!databaseUrl) {
      errors.push('DATABASE_URL is required when STORAGE_DRIVER=postgres');
    } else if (!/^postgres(ql)?:\/\//.test(databaseUrl)) {
      errors.push('DATABASE_URL must start with postgres:// or postgresql://');
    }
  }

  const port = (env.PORT ?? '3000').trim();
  if (!/^\d+$/.test(port)) {
    errors.push(`PORT=${port} is invalid, must be numeric`);
  } else {
    const value = Number(port);
    if (value < 1 || value > 65535) {
      errors.push(`PORT=${port} is out of range 1-65535`);
    }
  }

  const timeZone = env.TIME_ZONE?.trim();
  if (timeZone && !isValidTimeZone(timeZone)) {
    errors.push(`TIME_ZONE=${timeZone} is not a known IANA time zone`);
  }

  checkPositiveInt(env, 'DEFAULT_DAILY_GOAL', errors);
  checkPositiveInt(env, 'RECONCILE_INTERVAL_MINUTES', errors);
  checkPositiveInt(env, 'RECONCILE_FOREGROUND_MINUTES', errors);

  const order = env.SHIELD_CONSUMPTION_ORDER?.trim();
  if (order && !CONSUMPTION_ORDERS.includes(order)) {
    errors.push(`SHIELD_CONSUMPTION_ORDER=${order} is invalid, expected ${CONSUMPTION_ORDERS.join(' or ')}`);
  }

  const logLevel = env.LOG_LEVEL?.trim();
  if (logLevel && !LOG_LEVELS.includes(logLevel)) {
    errors.push(`LOG_LEVEL=${logLevel} is invalid`);
  }

  return errors;
}

export function assertRuntimeEnv(
  env: NodeJS.ProcessEnv,
  options: RuntimePreflightOptions = {}
): void {
  const errors = validateRuntimeEnv(env, options);
  if (errors.length === 0) {
    return;
  }

  const message = ['Runtime environment check failed:', ...errors.map((item) => `- ${item}`)].join(
    '\n'
  );
  throw new Error(message);
}
