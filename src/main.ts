/**
 * Main - Help pages and command dispatch
 */

import { handleBuild, handleRebuild, handleList } from "./commands/index.js";
import { parseArgs, getBool, getString } from "./args.js";
import {
  setRootPath,
  setCondaExecutable,
  ENVIRONMENT_FILE,
  ENVKIT_ROOT_ENV,
  ENVKIT_CONDA_ENV,
  ENVKIT_DEBUG_ENV,
} from "./constants.js";

export const VERSION = "1.0.0";

// ============================================================================
// Help System
// ============================================================================

function printMainHelp(): void {
  console.log(`
envkit v${VERSION} - Build and rebuild declarative package environments

USAGE
  envkit <command> [options]

COMMANDS
  build <env-name>      Create or update an environment, pruning removed packages
  rebuild <env-name>    Delete an environment and recreate it from scratch
  list                  List the environments defined in this repository

GLOBAL OPTIONS
  --root <path>         Directory holding the environment folders (default: cwd)
  --conda <cmd>         Package manager executable (default: conda)
  -h, --help            Show help (use with command for detailed help)
  -v, --version         Show version

ENVIRONMENT
  ${ENVKIT_ROOT_ENV}           Alternative to --root
  ${ENVKIT_CONDA_ENV}          Alternative to --conda
  ${ENVKIT_DEBUG_ENV}          Print each package manager command before running it

Each environment lives in <env-name>/${ENVIRONMENT_FILE}.
`);
}

function printBuildHelp(): void {
  console.log(`
envkit build - Create or update an environment

USAGE
  envkit build <env-name>

DESCRIPTION
  Runs "conda env update -n <env-name> -f <env-name>/${ENVIRONMENT_FILE} --prune".
  Packages no longer listed in the definition file are removed.

EXIT CODES
  0   Success
  1   Missing argument or definition file not found
  N   The package manager's own exit code when it fails
`);
}

function printRebuildHelp(): void {
  console.log(`
envkit rebuild - Delete and recreate an environment

USAGE
  envkit rebuild <env-name> [options]

DESCRIPTION
  Asks for confirmation, runs "conda remove -n <env-name> --all -y", then
  "conda env create -f <env-name>/${ENVIRONMENT_FILE}". Only the answer "y"
  confirms; anything else aborts with exit code 0.

OPTIONS
  -y, --yes             Skip the confirmation prompt

WARNING
  The definition file is checked after the delete. If it is missing, the
  environment stays deleted.
`);
}

function printListHelp(): void {
  console.log(`
envkit list - List environments

USAGE
  envkit list

DESCRIPTION
  Lists every directory under the root that holds ${ENVIRONMENT_FILE},
  skipping template and placeholder environments.
`);
}

function printCommandHelp(command: string): void {
  switch (command) {
    case "build":
      printBuildHelp();
      break;
    case "rebuild":
      printRebuildHelp();
      break;
    case "list":
      printListHelp();
      break;
    default:
      printMainHelp();
  }
}

// ============================================================================
// Main Entry Point
// ============================================================================

/**
 * Run envkit with the given arguments (without node and script path)
 * and resolve with the process exit code
 */
export async function run(argv: string[]): Promise<number> {
  const args = parseArgs(argv);

  const rootPath = getString(args.flags, "root");
  if (rootPath) {
    setRootPath(rootPath);
  }

  const conda = getString(args.flags, "conda");
  if (conda) {
    setCondaExecutable(conda);
  }

  if (getBool(args.flags, "v", "version")) {
    console.log(`envkit v${VERSION}`);
    return 0;
  }

  if (getBool(args.flags, "h", "help")) {
    printCommandHelp(args.command);
    return 0;
  }

  switch (args.command) {
    case "help":
      printCommandHelp(args.positional[0] ?? "");
      return 0;

    case "build":
      return handleBuild({ name: args.positional[0] });

    case "rebuild":
      return handleRebuild({
        name: args.positional[0],
        yes: getBool(args.flags, "y", "yes"),
      });

    case "list":
      return handleList();

    default:
      console.error(`Unknown command: ${args.command}`);
      console.error("Run 'envkit --help' for available commands");
      return 1;
  }
}
