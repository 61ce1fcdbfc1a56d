import chalk from "chalk";
import { APIError, CLIError, FilesystemError } from "./types.js";
import { toCLIError } from "./catalog.js";
import { isJsonMode } from "../cli-context.js";
import { redactUrl } from "../logger.js";

const SYM = {
  error: "✗",
  arrow: "→",
  prompt: "$",
};

/**
 * Wrap text to fit within a given width, preserving indentation.
 */
function wrapText(text: string, maxWidth: number, indent = ""): string[] {
  const words = text.split(" ");
  const lines: string[] = [];
  let currentLine = "";

  for (const word of words) {
    const testLine = currentLine ? `${currentLine} ${word}` : word;
    if (testLine.length <= maxWidth) {
      currentLine = testLine;
    } else {
      if (currentLine) lines.push(currentLine);
      currentLine = word;
    }
  }
  if (currentLine) lines.push(currentLine);

  return lines.map((line, i) => (i === 0 ? line : indent + line));
}

/**
 * Context lines specific to the error class: request target for API errors,
 * file path for file-system errors.
 */
function contextLines(error: CLIError): string[] {
  if (error instanceof APIError && error.url) {
    const status = error.status !== undefined ? `HTTP ${error.status} ` : "";
    return [`${status}${redactUrl(error.url)}`];
  }
  if (error instanceof FilesystemError) {
    return [error.systemCode ? `${error.path} (${error.systemCode})` : error.path];
  }
  return [];
}

/**
 * Build the human-readable error block, one entry per output line.
 */
export function formatError(error: CLIError, width = 80): string[] {
  const termWidth = Math.min(width, 80);
  const output: string[] = [""];

  const errorLines = wrapText(error.message, termWidth - 4, "  ");
  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(errorLines[0] ?? "")}`);
  for (const line of errorLines.slice(1)) {
    output.push(`  ${chalk.red(line)}`);
  }

  const details = [...contextLines(error), ...(error.details ? error.details.split("\n") : [])];
  if (details.length > 0) {
    output.push("");
    for (const detail of details) {
      for (const line of wrapText(detail, termWidth - 4, "  ")) {
        output.push(`  ${chalk.dim(line)}`);
      }
    }
  }

  if (error.suggestion) {
    output.push("");
    const suggestionLines = wrapText(error.suggestion, termWidth - 4, "  ");
    output.push(`  ${chalk.yellow(SYM.arrow)} ${suggestionLines[0] ?? ""}`);
    for (const line of suggestionLines.slice(1)) {
      output.push(`    ${line}`);
    }
  }

  const examples = error.examples?.length ? error.examples : error.example ? [error.example] : [];
  if (examples.length === 1) {
    output.push("");
    output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(examples[0] ?? "")}`);
  } else if (examples.length > 1) {
    output.push("");
    output.push(`  ${chalk.dim("Examples:")}`);
    for (const ex of examples.slice(0, 3)) {
      output.push(`    ${chalk.cyan(`${SYM.prompt} ${ex}`)}`);
    }
  }

  if (error.docs) {
    output.push("");
    output.push(`  ${chalk.dim("Docs:")} ${chalk.blue.underline(error.docs)}`);
  }

  output.push("");
  return output;
}

/**
 * JSON shape of an error, without undefined fields.
 */
export function errorToJson(error: CLIError): Record<string, unknown> {
  const output = {
    code: error.code,
    message: error.message,
    status: error instanceof APIError ? error.status : undefined,
    suggestion: error.suggestion,
    example: error.example,
    examples: error.examples,
    docs: error.docs,
    details: error.details,
  };

  return Object.fromEntries(Object.entries(output).filter(([, v]) => v !== undefined));
}

/**
 * Render any thrown value to stderr, as JSON in --json mode.
 */
export function renderError(error: unknown, json = isJsonMode()): void {
  const cliError = toCLIError(error);

  if (json) {
    console.error(JSON.stringify({ success: false, error: errorToJson(cliError) }, null, 2));
    return;
  }

  for (const line of formatError(cliError, process.stdout.columns || 80)) {
    console.error(line);
  }
}
