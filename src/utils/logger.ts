/**
 * Live execution logger for webqa.
 *
 * All output goes to stderr so stdout stays clean for JSON contract output.
 * Emoji prefixes give instant visual context in the terminal.
 */

// ── Core write ──────────────────────────────────────────────

let muted = false;

function write(message: string): void {
  if (muted) return;
  process.stderr.write(message + '\n');
}

/** Silence all output. */
export function setMuted(value: boolean): void {
  muted = value;
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function step(index: number, description: string): void {
  write(`📋 [${String(index)}] ${description}`);
}

export function stepResult(index: number, success: boolean, description: string): void {
  const icon = success ? '✅' : '❌';
  write(`${icon} [${String(index)}] ${description}`);
}

export function retry(index: number, reason: string): void {
  write(`🔁 [${String(index)}] retrying after: ${reason}`);
}

export function diagnostic(index: number, ok: boolean, chars: number): void {
  write(
    ok
      ? `🔍 [${String(index)}] diagnostic read: ${String(chars)} chars of markup`
      : `🔍 [${String(index)}] diagnostic read failed`,
  );
}

export function rejected(message: string): void {
  write(`🚫 ${message}`);
}

export function section(title: string): void {
  write(`\n${'─'.repeat(50)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(50)}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function llm(message: string): void {
  write(`🧠 ${message}`);
}
