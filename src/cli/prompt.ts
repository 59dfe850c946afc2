import * as readline from "readline/promises";

/**
 * Numeric command-line arguments, prompting on the terminal for any that were not given.
 */
export async function resolveNumbers(
  args: readonly (string | undefined)[],
  questions: readonly string[]
): Promise<number[]> {
  const missing = questions.some((_, i) => args[i] === undefined);
  const rl = missing ? readline.createInterface({ input: process.stdin, output: process.stdout }) : null;

  try {
    const values: number[] = [];
    for (const [i, question] of questions.entries()) {
      const raw = args[i] ?? (rl ? await rl.question(`${question}: `) : "");
      values.push(raw.trim() === "" ? Number.NaN : Number(raw));
    }
    return values;
  } finally {
    rl?.close();
  }
}
