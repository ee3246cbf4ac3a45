/** Diagnostics go to stderr; stdout carries only the verification report. */
export function log(message: string): void {
  const ts = new Date().toISOString().replace('T', ' ').replace(/\.\d+Z/, '');
  for (const line of message.split('\n')) {
    console.error(`[${ts}] ${line}`);
  }
}
