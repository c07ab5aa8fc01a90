// --- Colors & formatting ---
export const c = {
  green: (s: string) => `\x1b[32m${s}\x1b[0m`,
  red: (s: string) => `\x1b[31m${s}\x1b[0m`,
  cyan: (s: string) => `\x1b[36m${s}\x1b[0m`,
  dim: (s: string) => `\x1b[90m${s}\x1b[0m`,
  bold: (s: string) => `\x1b[1m${s}\x1b[0m`,
  bgCyan: (s: string) => `\x1b[46m\x1b[30m${s}\x1b[0m`,
};

export type Print = (line: string) => void;

export interface Ui {
  log(msg: string): void;
  ok(msg: string): void;
  fail(msg: string): void;
  info(msg: string): void;
}

export function createUi(print: Print): Ui {
  return {
    log: (msg) => print(msg),
    ok: (msg) => print(`  ${c.green('✓')} ${msg}`),
    fail: (msg) => print(`  ${c.red('✗')} ${msg}`),
    info: (msg) => print(`  ${c.dim(msg)}`),
  };
}
