/**
 * Live execution logger for browser-fleet.
 *
 * All output goes to stderr so stdout stays clean for listings and
 * JSON output. Emoji prefixes give instant visual context in the
 * terminal. `BROWSER_FLEET_QUIET=1` drops info and detail lines.
 */

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

function quiet(): boolean {
  return process.env['BROWSER_FLEET_QUIET'] === '1';
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  if (quiet()) return;
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  if (quiet()) return;
  write(`   ${message}`);
}

export function section(title: string): void {
  if (quiet()) return;
  write(`\n${'─'.repeat(50)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(50)}`);
}

export function session(index: number, message: string): void {
  if (quiet()) return;
  write(`🌐 [session ${String(index)}] ${message}`);
}

export function taskResult(
  index: number,
  name: string,
  success: boolean,
  seconds: number | null,
): void {
  if (success && quiet()) return;
  const icon = success ? '✅' : '❌';
  const time = seconds === null ? '' : ` (${seconds.toFixed(2)}s)`;
  write(`${icon} [session ${String(index)}] ${name}${time}`);
}

export function click(message: string): void {
  if (quiet()) return;
  write(`🖱️  ${message}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}
