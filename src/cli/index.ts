/**
 * Command line entry: holdem <scenario.json>
 *
 * Prints the scenario report as JSON. Exit code 0 on success, 1 on
 * unreadable or malformed input and on anything the engine rejects.
 */

import fs from 'fs';
import path from 'path';
import { EngineError } from '../game/engine/EngineErrors';
import { parseScenario } from './scenario';
import { runScenario } from './runScenario';

export interface CliIO {
  readonly stdout: (line: string) => void;
  readonly stderr: (line: string) => void;
  readonly readFile: (filePath: string) => string;
}

export const defaultIO: CliIO = {
  stdout: line => console.log(line),
  stderr: line => console.error(line),
  readFile: filePath => fs.readFileSync(filePath, 'utf-8'),
};

export const USAGE = 'Usage: holdem <scenario.json>';

function describeError(error: unknown): string {
  if (error instanceof EngineError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Run the tool with arguments after the script name
 */
export function runCli(args: readonly string[], io: CliIO = defaultIO): number {
  const filePath = args[0];
  if (!filePath) {
    io.stderr(USAGE);
    return 1;
  }

  let raw: string;
  try {
    raw = io.readFile(path.resolve(filePath));
  } catch (error) {
    io.stderr(`Cannot read ${filePath}: ${describeError(error)}`);
    return 1;
  }

  try {
    const report = runScenario(parseScenario(JSON.parse(raw)));
    io.stdout(JSON.stringify(report, null, 2));
    return 0;
  } catch (error) {
    io.stderr(describeError(error));
    return 1;
  }
}
