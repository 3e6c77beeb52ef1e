// ─── CLI ───────────────────────────────────────────────────────────
// `logex "<expression>" [options]`: compile, validate, optimize and
// evaluate one expression against the standard library. All output goes
// through an injectable sink, so the runner never touches `process`.

import { readFile } from "node:fs/promises";
import {
  createStandardLibrary,
  describeValidation,
  evaluate,
  formatValue,
  optimizeWithEnvironment,
  parse,
  serializeExpression,
  tokenToString,
  tokenize,
  transformTernary,
  validate,
  type Expression,
  type StaticEnvironment,
} from "@logex/core";
import yargs from "yargs";
import { parseVariableFlag, parseVariablesFile } from "./variables";

const TAG = "[logex]";

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
  readFile(path: string): Promise<string>;
}

export const defaultIo: CliIo = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  readFile: (path) => readFile(path, "utf8"),
};

const VALUE_OPTIONS = new Set(["--vars", "--var", "--seed"]);

function isOptionToken(arg: string): boolean {
  return arg === "--" || arg === "-h" || /^--[A-Za-z][\w-]*(=.*)?$/.test(arg);
}

/**
 * Prefixes a space to arguments that start with `-` but are not options,
 * so `logex "-1 + 2"` reaches the scanner as an expression. Values right
 * after an option that takes one are left alone.
 */
export function protectExpressionArgs(argv: readonly string[]): string[] {
  return argv.map((arg, index) => {
    if (!arg.startsWith("-") || isOptionToken(arg)) return arg;
    const previous = argv[index - 1];
    return previous !== undefined && VALUE_OPTIONS.has(previous) ? arg : ` ${arg}`;
  });
}

function buildParser(argv: readonly string[]) {
  return yargs(argv)
    .scriptName("logex")
    .usage("$0 <expression> [options]")
    .env("LOGEX")
    .parserConfiguration({ "parse-positional-numbers": false })
    .options({
      vars: {
        describe: "JSON file with variable bindings",
        type: "string",
      },
      var: {
        array: true,
        describe: "Bind a variable: name=value (value read as JSON, else as text)",
        type: "string",
      },
      optimize: {
        default: true,
        describe: "Rewrite if_then(c, a, b) into a lazy ternary",
        type: "boolean",
      },
      fold: {
        default: false,
        describe: "Fold constant subtrees before evaluating",
        type: "boolean",
      },
      validate: {
        default: true,
        describe: "Check variables and functions before evaluating",
        type: "boolean",
      },
      seed: {
        describe: "Seed for random and choice",
        type: "number",
      },
      ast: {
        default: false,
        describe: "Print the compiled tree as JSON instead of evaluating",
        type: "boolean",
      },
      tokens: {
        default: false,
        describe: "Print the token stream instead of evaluating",
        type: "boolean",
      },
      "list-functions": {
        default: false,
        describe: "List the registered functions",
        type: "boolean",
      },
      verbose: {
        default: false,
        describe: "Trace each compilation step to stderr",
        type: "boolean",
      },
      help: {
        alias: "h",
        default: false,
        describe: "Show help",
        type: "boolean",
      },
    })
    .help(false)
    .version(false)
    .strictOptions()
    .exitProcess(false)
    .fail(false);
}

async function loadVariables(
  environment: StaticEnvironment,
  io: CliIo,
  file: string | undefined,
  flags: readonly string[]
): Promise<void> {
  if (file !== undefined) {
    environment.addVariables(parseVariablesFile(await io.readFile(file)));
  }
  for (const flag of flags) {
    const [name, value] = parseVariableFlag(flag);
    environment.addVariable(name, value);
  }
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * Runs the command line with already-stripped arguments.
 * Returns the process exit code: 0 on success, 1 on any error.
 */
export async function runCli(argv: readonly string[], io: CliIo = defaultIo): Promise<number> {
  const parser = buildParser(protectExpressionArgs(argv));

  try {
    const args = await parser.parseAsync();
    const trace = (message: string) => {
      if (args.verbose) io.stderr(`${TAG} ${message}`);
    };

    if (args.help) {
      parser.showHelp((text) => io.stdout(text));
      return 0;
    }

    const environment = createStandardLibrary({ seed: args.seed });
    await loadVariables(environment, io, args.vars, args.var ?? []);

    if (args["list-functions"]) {
      for (const fn of environment.listFunctions()) {
        io.stdout(`function ${fn.name}${fn.params}`);
      }
      return 0;
    }

    const source = args._.map(String).join(" ");
    if (source.trim().length === 0) {
      io.stderr(`${TAG} No expression given`);
      return 1;
    }

    const tokens = tokenize(source);
    if (args.tokens) {
      io.stdout(tokens.map(tokenToString).join(" "));
      return 0;
    }
    trace(`tokens: ${tokens.map(tokenToString).join(" ")}`);

    let expression: Expression = parse(tokens);
    trace(`parsed: ${JSON.stringify(serializeExpression(expression))}`);

    if (args.validate) {
      const result = validate(environment, expression);
      if (result.kind !== "valid") {
        io.stderr(`${TAG} ${describeValidation(result)}`);
        return 1;
      }
      trace("validation passed");
    }

    if (args.fold) {
      expression = optimizeWithEnvironment(environment, expression);
      trace(`optimized: ${JSON.stringify(serializeExpression(expression))}`);
    } else if (args.optimize) {
      expression = transformTernary(expression);
      trace(`optimized: ${JSON.stringify(serializeExpression(expression))}`);
    }

    if (args.ast) {
      io.stdout(JSON.stringify(serializeExpression(expression), null, 2));
      return 0;
    }

    io.stdout(formatValue(evaluate(environment, expression)));
    return 0;
  } catch (error) {
    io.stderr(`${TAG} ${describeError(error)}`);
    return 1;
  }
}
