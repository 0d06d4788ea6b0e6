import path from 'node:path';
import dotenv from 'dotenv';

const DEFAULT_ENV_PATH = path.resolve('.env');
const DEFAULT_ORIGINS = ['http://localhost:4100', 'http://localhost:5173'];

function load(envPath: string) {
  const resolved = path.resolve(envPath);
  const result = dotenv.config({ path: resolved, override: true });
  const code = (result.error as NodeJS.ErrnoException | undefined)?.code;
  if (result.error && code !== 'ENOENT') {
    throw result.error;
  }
}

export function loadEnvironment(envPath?: string) {
  load(envPath ?? DEFAULT_ENV_PATH);
}

export function getServerPort(): number {
  const raw = Number(process.env.TEST_SERVER_PORT ?? process.env.SERVER_PORT ?? process.env.PORT ?? 4100);
  return Number.isFinite(raw) && raw >= 0 ? raw : 4100;
}

export function parseAllowedOrigins(raw = process.env.ALLOWED_ORIGINS): string[] {
  const list = raw
    ? raw
        .split(',')
        .map((v) => v.trim())
        .filter(Boolean)
    : DEFAULT_ORIGINS;
  // de-duplicate
  return Array.from(new Set(list));
}

export function isOriginAllowed(origin: string | undefined, allowed: string[]): boolean {
  if (!origin) return true; // allow same-host tools like curl
  return allowed.includes(origin);
}
