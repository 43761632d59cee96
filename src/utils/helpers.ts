import * as os from 'os';

/** File type bits of st_mode */
const S_IFMT = 0o170000;
const S_IFDIR = 0o040000;

/**
 * Expand ~ to home directory in a path
 */
export function expandPath(filePath: string): string {
  if (filePath.startsWith('~')) {
    return filePath.replace('~', os.homedir());
  }
  return filePath;
}

/**
 * Validate a port number string
 * Returns error message or null if valid
 */
export function validatePort(value: string): string | null {
  const port = parseInt(value, 10);
  if (isNaN(port) || port < 1 || port > 65535 || String(port) !== value.trim()) {
    return 'Please enter a valid port number (1-65535)';
  }
  return null;
}

/**
 * Split a "user@host:port" string into its parts.
 * Bracketed IPv6 literals ("[::1]:2222") keep their colons.
 */
export function parseHostString(value: string): { user?: string; host: string; port?: number } {
  let rest = value.trim();
  let user: string | undefined;

  const at = rest.lastIndexOf('@');
  if (at !== -1) {
    user = rest.slice(0, at) || undefined;
    rest = rest.slice(at + 1);
  }

  let host = rest;
  let portText: string | undefined;
  if (rest.startsWith('[')) {
    const close = rest.indexOf(']');
    if (close === -1) {
      throw new Error(`Unterminated IPv6 literal in host string '${value}'`);
    }
    host = rest.slice(1, close);
    const tail = rest.slice(close + 1);
    if (tail.startsWith(':')) {
      portText = tail.slice(1);
    }
  } else if (rest.split(':').length === 2) {
    [host, portText] = rest.split(':');
  }

  if (!host) {
    throw new Error(`No host in host string '${value}'`);
  }

  let port: number | undefined;
  if (portText !== undefined) {
    const error = validatePort(portText);
    if (error) {
      throw new Error(`${error} in host string '${value}'`);
    }
    port = parseInt(portText, 10);
  }

  return { user, host, port };
}

/**
 * Permission bits of st_mode (the S_IMODE of C)
 */
export function permissionBits(mode: number): number {
  return mode & 0o7777;
}

export function isDirectoryMode(mode: number): boolean {
  return (mode & S_IFMT) === S_IFDIR;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
