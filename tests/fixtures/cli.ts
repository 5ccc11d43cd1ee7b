import { Command } from "commander";
import { vi } from "vitest";

export class ExitCalled extends Error {
  constructor(public readonly code: number | string | null | undefined) {
    super(`process.exit(${String(code)})`);
  }
}

export interface CliRun {
  stdout: string[];
  stderr: string[];
  /** Code passed to process.exit, or undefined when the action returned normally */
  exitCode: number | string | null | undefined;
}

/**
 * Run one registered command in process, capturing console output and exit
 */
export async function runCommand(register: (program: Command) => void, argv: string[]): Promise<CliRun> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
    stdout.push(args.map(String).join(" "));
  });
  vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
    stderr.push(args.map(String).join(" "));
  });
  vi.spyOn(process, "exit").mockImplementation((code?: number | string | null): never => {
    throw new ExitCalled(code);
  });

  const program = new Command();
  program.exitOverride();
  register(program);

  let exitCode: CliRun["exitCode"];
  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (error) {
    if (!(error instanceof ExitCalled)) {
      throw error;
    }
    exitCode = error.code;
  } finally {
    vi.restoreAllMocks();
  }
  return { stdout, stderr, exitCode };
}
