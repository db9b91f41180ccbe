/** Where command results are printed. */
export interface Output {
  print(line: string): void;
  error(line: string): void;
}

export const consoleOutput: Output = {
  print: (line) => {
    process.stdout.write(`${line}\n`);
  },
  error: (line) => {
    process.stderr.write(`${line}\n`);
  },
};

export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
