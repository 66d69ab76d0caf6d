import { Command, Option } from "commander";
import { ANALYSIS_TYPES, toErrorMessage } from "@depintel/core";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { parseTimeoutMs } from "./application/create-orchestrator.js";
import { formatAnalyzeOutput, type AnalyzeOutputMode } from "./application/format-analyze-output.js";
import { formatRecommendOutput, type RecommendOutputMode } from "./application/format-recommend-output.js";
import { LOG_LEVELS, createStderrLogger, parseLogLevel, type LogLevel } from "./application/logger.js";
import { parseOptionPairs } from "./application/parse-option-pairs.js";
import { runAnalyzeCommand } from "./application/run-analyze-command.js";
import { runRecommendCommand } from "./application/run-recommend-command.js";

const program = new Command();
const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), "../package.json");
const { version } = JSON.parse(readFileSync(packageJsonPath, "utf8")) as { version: string };

const collect = (value: string, previous: string[]): string[] => [...previous, value];

const logLevelOption = (): Option =>
  new Option("--log-level <level>", "log verbosity: silent, error, warn, info, debug (logs are written to stderr)")
    .choices(LOG_LEVELS)
    .default(parseLogLevel(process.env["DEPINTEL_LOG_LEVEL"]));

const outputOption = (): Option =>
  new Option("--output <mode>", "output mode: summary (default) or json (full result)")
    .choices(["summary", "json"])
    .default("summary");

const timeoutOption = (): Option =>
  new Option("--metadata-timeout <ms>", "bound on metadata lookups per analysis, in milliseconds").default(
    process.env["DEPINTEL_METADATA_TIMEOUT_MS"],
  );

program
  .name("depintel")
  .description("Dependency intelligence analysis over a project snapshot")
  .version(version);

program
  .command("analyze")
  .argument("<snapshot>", "path to the project snapshot (JSON)")
  .addOption(
    new Option("--type <analysis-type>", "analysis to run").choices(ANALYSIS_TYPES).makeOptionMandatory(),
  )
  .option("--option <key=value>", "analysis option, repeatable (dotted keys nest: weights.health=0.4)", collect, [])
  .addOption(logLevelOption())
  .addOption(outputOption())
  .addOption(timeoutOption())
  .option("--json", "shortcut for --output json")
  .action(
    async (
      snapshot: string,
      options: {
        type: string;
        option: string[];
        logLevel: LogLevel;
        output: AnalyzeOutputMode;
        metadataTimeout?: string;
        json?: boolean;
      },
    ) => {
      const logger = createStderrLogger(options.logLevel);
      try {
        const result = await runAnalyzeCommand(
          { snapshotPath: snapshot, analysisType: options.type, options: parseOptionPairs(options.option) },
          { metadataTimeoutMs: parseTimeoutMs(options.metadataTimeout) },
          logger,
        );
        const outputMode: AnalyzeOutputMode = options.json === true ? "json" : options.output;
        process.stdout.write(`${formatAnalyzeOutput(result, outputMode)}\n`);
      } catch (error) {
        logger.error(toErrorMessage(error));
        process.exitCode = 1;
      }
    },
  );

program
  .command("recommend")
  .argument("<snapshot>", "path to the project snapshot (JSON)")
  .option("--target-license <license>", "license the project is distributed under (default MIT)")
  .addOption(
    new Option("--profile-type <type>", "performance profile to run").choices(["bundle_size", "runtime"]),
  )
  .addOption(logLevelOption())
  .addOption(outputOption())
  .addOption(timeoutOption())
  .option("--json", "shortcut for --output json")
  .action(
    async (
      snapshot: string,
      options: {
        targetLicense?: string;
        profileType?: "bundle_size" | "runtime";
        logLevel: LogLevel;
        output: RecommendOutputMode;
        metadataTimeout?: string;
        json?: boolean;
      },
    ) => {
      const logger = createStderrLogger(options.logLevel);
      try {
        const result = await runRecommendCommand(
          { snapshotPath: snapshot, targetLicense: options.targetLicense, profileType: options.profileType },
          { metadataTimeoutMs: parseTimeoutMs(options.metadataTimeout) },
          logger,
        );
        const outputMode: RecommendOutputMode = options.json === true ? "json" : options.output;
        process.stdout.write(`${formatRecommendOutput(result, outputMode)}\n`);
      } catch (error) {
        logger.error(toErrorMessage(error));
        process.exitCode = 1;
      }
    },
  );

if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

const executablePath = process.argv[0] ?? "";
const scriptPath = process.argv[1] ?? "";

const argv =
  process.argv[2] === "--"
    ? [executablePath, scriptPath, ...process.argv.slice(3)]
    : process.argv;

if (argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

await program.parseAsync(argv);
