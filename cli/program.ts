import { Command, CommanderError } from "commander";
import yaml from "js-yaml";
import { z } from "zod";
import { DataSpec } from "../src/DataSpec.js";
import { PathResolutionError, PathSyntaxError } from "../src/errors.js";
import { ConsoleLogger } from "../src/logger/ConsoleLogger.js";
import { LOG_LEVELS } from "../src/logger/LoggerProvider.js";
import { DATA_FORMATS } from "../src/parser/index.js";
import { FsRepository } from "../src/repository/FsRepository.js";
import type { SchemaModel } from "../src/schema/types.js";
import { formatValidationError } from "../src/validator/structuralValidate.js";
import { toNative, type Value } from "../src/value/Value.js";

export const EXIT_OK = 0;
/** Validation failed, or a path did not resolve. */
export const EXIT_FAILURE = 1;
/** Bad options, or a document that could not be loaded. */
export const EXIT_ERROR = 2;

/**
 * Where the CLI writes, and where relative paths start.
 */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  cwd?: string;
}

const Format = z.enum(DATA_FORMATS);
const LogLevelOption = z.enum(LOG_LEVELS);
const MaxDepth = z.coerce.number().int().positive();

const ValidateArgs = z.object({
  data: z.string(),
  schema: z.string(),
  dataFormat: Format.optional(),
  schemaFormat: Format.optional(),
  maxDepth: MaxDepth.optional(),
  logLevel: LogLevelOption.default("warn"),
});

const SearchArgs = z.object({
  data: z.string(),
  path: z.string(),
  dataFormat: Format.optional(),
  maxDepth: MaxDepth.optional(),
  logLevel: LogLevelOption.default("warn"),
});

class UsageError extends Error {}

/**
 * Builds the `dataspec` program. Each action reports its exit code through
 * `setExitCode`; commander's own exits are turned into CommanderErrors.
 */
export function buildProgram(io: CliIO, setExitCode: (code: number) => void): Command {
  const program = new Command();

  program
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    })
    .exitOverride();

  program
    .name("dataspec")
    .description("Validate YAML/JSON data against a structural schema and query it with DataPath");

  program
    .command("validate")
    .description("Validate a data file against a schema file")
    .requiredOption("--data <file>", "Data file (YAML or JSON)")
    .requiredOption("--schema <file>", "Schema file (YAML or JSON)")
    .option("--data-format <format>", "Data format: yaml or json (default: by extension)")
    .option("--schema-format <format>", "Schema format: yaml or json (default: by extension)")
    .option("--max-depth <n>", "Deepest nesting to validate")
    .option("--log-level <level>", "debug, info, warn, error or silent", "warn")
    .action(async (opts: unknown) => {
      setExitCode(await runValidate(opts, io));
    });

  program
    .command("search")
    .description("Print the value a DataPath expression points at")
    .requiredOption("--data <file>", "Data file (YAML or JSON)")
    .requiredOption("--path <expr>", "DataPath expression, e.g. projects[id=543].name")
    .option("--data-format <format>", "Data format: yaml or json (default: by extension)")
    .option("--max-depth <n>", "Longest path accepted, in steps")
    .option("--log-level <level>", "debug, info, warn, error or silent", "warn")
    .action(async (opts: unknown) => {
      setExitCode(await runSearch(opts, io));
    });

  return program;
}

/**
 * Runs the CLI on user arguments (without the node and script entries).
 *
 * @returns The process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  let exitCode = EXIT_OK;
  const program = buildProgram(io, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? EXIT_OK : EXIT_ERROR;
    }
    if (err instanceof UsageError) {
      io.stderr(`Error: ${err.message}\n`);
      return EXIT_ERROR;
    }
    throw err;
  }

  return exitCode;
}

async function runValidate(opts: unknown, io: CliIO): Promise<number> {
  const args = parseArgs(ValidateArgs, opts);
  const dataSpec = createDataSpec(io, args);

  let loaded: { schema: SchemaModel; value: Value };
  try {
    const schema = await dataSpec.loadSchemaFile(args.schema, args.schemaFormat);
    const value = await dataSpec.loadDataFile(args.data, args.dataFormat);
    loaded = { schema, value };
  } catch (err) {
    io.stderr(`Error: ${messageOf(err)}\n`);
    return EXIT_ERROR;
  }

  const result = dataSpec.validate(loaded.value, loaded.schema);
  if (result.ok) {
    io.stdout("Validation successful: data matches the schema.\n");
    return EXIT_OK;
  }

  io.stdout(`Validation failed with ${result.errors.length} error(s):\n`);
  for (const error of result.errors) {
    io.stdout(`  ${formatValidationError(error)}\n`);
  }
  return EXIT_FAILURE;
}

async function runSearch(opts: unknown, io: CliIO): Promise<number> {
  const args = parseArgs(SearchArgs, opts);
  const dataSpec = createDataSpec(io, args);

  let value: Value;
  try {
    value = await dataSpec.loadDataFile(args.data, args.dataFormat);
  } catch (err) {
    io.stderr(`Error: ${messageOf(err)}\n`);
    return EXIT_ERROR;
  }

  try {
    io.stdout(`${render(dataSpec.search(value, args.path))}\n`);
    return EXIT_OK;
  } catch (err) {
    if (err instanceof PathSyntaxError || err instanceof PathResolutionError) {
      io.stderr(`Error: ${err.message}\n`);
      return EXIT_FAILURE;
    }
    throw err;
  }
}

function parseArgs<T extends z.ZodTypeAny>(shape: T, opts: unknown): z.infer<T> {
  const result = shape.safeParse(opts);
  if (!result.success) {
    const issue = result.error.issues[0];
    const option = issue.path.map((p) => `--${kebab(String(p))}`).join(" ");
    throw new UsageError(`invalid value for ${option}: ${issue.message}`);
  }
  return result.data;
}

function createDataSpec(
  io: CliIO,
  args: { maxDepth?: number; logLevel: z.infer<typeof LogLevelOption> }
): DataSpec {
  return new DataSpec({
    logger: new ConsoleLogger(args.logLevel),
    maxDepth: args.maxDepth,
    repository: new FsRepository(io.cwd ?? process.cwd()),
  });
}

/**
 * Scalars print as plain text, containers as YAML.
 */
function render(value: Value): string {
  if (value.type === "scalar") {
    return value.value === null ? "null" : String(value.value);
  }
  return yaml.dump(toNative(value), { sortKeys: false }).trimEnd();
}

function kebab(name: string): string {
  return name.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
