import { Command, InvalidArgumentError } from "commander";
import { z } from "zod";
import {
    CommandRunner,
    InvalidStateError,
    createLogger,
    formatZodError,
    loadRunnerConfig,
    needsRun,
} from "@txrun/core";
import type { Logger, RunnerConfig } from "@txrun/core";
import { collectVcfBamArgs, errorMsg } from "@txrun/cli-helpers";

export interface CliIO {
    out(line: string): void;
    err(line: string): void;
    setExitCode(code: number): void;
}

export interface ProgramDeps {
    io?: CliIO;
    logger?: Logger;
    config?: RunnerConfig;
}

const consoleIO: CliIO = {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
    setExitCode: (code) => {
        process.exitCode = code;
    },
};

const runOptionsSchema = z.object({
    output: z.string().min(1).describe("Final output path"),
    sideExt: z.array(z.string().min(1)).default([]).describe("Sidecar suffixes promoted with the output"),
    timeout: z.number().int().positive().optional().describe("Kill the command after this many milliseconds"),
});

function parsePositiveInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError("must be a positive integer");
    }
    return parsed;
}

/**
 * Build the txrun command line program
 */
export function createProgram(deps: ProgramDeps = {}): Command {
    const io = deps.io ?? consoleIO;
    const program = new Command();

    const resolveConfig = (): RunnerConfig => deps.config ?? loadRunnerConfig();
    const resolveLogger = (config: RunnerConfig): Logger =>
        deps.logger ?? createLogger({ level: config.logLevel });

    program
        .name("txrun")
        .description("Idempotent, transactional runs of external command-line programs")
        .version("0.1.0");

    program
        .command("run")
        .description("Run a shell command producing one output file, unless it already exists")
        .requiredOption("-o, --output <path>", "output file the command writes")
        .option("-s, --side-ext <ext...>", "sidecar suffixes promoted with the output, e.g. .tbi")
        .option("--timeout <ms>", "terminate the command after this many milliseconds", parsePositiveInteger)
        .argument("<command...>", "shell command, quoted or given after --")
        .action(async (commandParts: string[], rawOptions: unknown) => {
            const parsed = runOptionsSchema.safeParse(rawOptions);
            if (!parsed.success) {
                throw new InvalidStateError(`Invalid options: ${formatZodError(parsed.error)}`);
            }
            const { output, sideExt, timeout } = parsed.data;

            const baseConfig = resolveConfig();
            const config = timeout === undefined ? baseConfig : { ...baseConfig, timeoutMs: timeout };
            const runner = new CommandRunner({ logger: resolveLogger(config), config });

            const outFile = await runner.runCommand(output, commandParts.join(" "), { sideExtensions: sideExt });
            io.out(outFile);
        });

    program
        .command("needs-run")
        .description("Print whether any of the given outputs is missing or empty")
        .argument("<paths...>", "output files to check")
        .action(async (paths: string[]) => {
            io.out(String(await needsRun(paths)));
        });

    program
        .command("inputs")
        .description("Classify VCF and BAM/CRAM inputs, expanding list files")
        .argument("<paths...>", "input files or list files")
        .action(async (paths: string[]) => {
            const collected = await collectVcfBamArgs(paths);
            io.out(JSON.stringify(collected, null, 2));

            const missing = collected.missing ?? [];
            if (missing.length > 0) {
                io.err(errorMsg(missing.map((f) => `Input file not found: ${f}`)));
                io.setExitCode(1);
            }
        });

    return program;
}
