export const DEFAULT_PORT = 8080;

/** The server only listens on loopback. */
export const LISTEN_HOST = '127.0.0.1';

/** Unset or empty `PORT` means the default; otherwise decimal digits only. */
export function resolvePort(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_PORT;
  }
  const digits = raw.trim();
  if (!/^\d+$/.test(digits)) {
    throw new Error(`Invalid PORT value "${raw}"`);
  }
  const port = Number(digits);
  if (port < 1 || port > 65535) {
    throw new Error(`Invalid PORT value "${raw}"`);
  }
  return port;
}
