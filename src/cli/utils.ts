import { ConfigurationError, ManifestUnreadableError } from '../services/errors';

// ANSI color constants
export const GREEN = '\x1b[32m';
export const YELLOW = '\x1b[33m';
export const RED = '\x1b[31m';
export const CYAN = '\x1b[36m';
export const BOLD = '\x1b[1m';
export const DIM = '\x1b[2m';
export const NC = '\x1b[0m';

export const EXIT_OK = 0;
/** At least one entry failed */
export const EXIT_FAILURES = 1;
export const EXIT_MANIFEST_UNREADABLE = 2;
export const EXIT_CONFIGURATION = 3;

export function exitCodeFor(err: unknown): number {
  if (err instanceof ManifestUnreadableError) return EXIT_MANIFEST_UNREADABLE;
  if (err instanceof ConfigurationError) return EXIT_CONFIGURATION;
  return EXIT_FAILURES;
}

export function header(title: string): void {
  const bar = '━'.repeat(Math.max(0, 48 - title.length));
  console.log('');
  console.log(`${CYAN}━━━ ${title} ${bar}${NC}`);
  console.log('');
}

export function success(msg: string): void {
  console.log(`  ${GREEN}✓${NC} ${msg}`);
}

export function warn(msg: string): void {
  console.log(`  ${YELLOW}!${NC} ${msg}`);
}

export function fail(msg: string): void {
  console.log(`  ${RED}✗${NC} ${msg}`);
}

export function info(msg: string): void {
  console.log(`  ${DIM}${msg}${NC}`);
}
