#!/usr/bin/env node
/**
 * @fileoverview Burrow CLI entry point.
 *
 * Resolves the configuration, opens the log, roots a file store at the
 * configured directory and runs the shell engine on a Node.js terminal.
 *
 * Usage:
 *   burrow
 *   burrow --root ./sandbox
 *   burrow --root ./sandbox --log-file /tmp/burrow.log --log-level info
 *   BURROW_ALIAS_DEPTH=16 burrow
 *
 * Exit status: 0 after `exit` or end of input, 130 after Ctrl+C at the
 * prompt, 1 when startup fails.
 *
 * @module bin/burrow
 */

import { Command } from 'commander';
import pc from 'picocolors';
import { createNodeTerminalAPI } from '../src/cli/terminal';
import { resolveConfig, type ConfigFlags, type ShellConfig } from '../src/config';
import { errorMessage } from '../src/engine/errors';
import { ShellEngine } from '../src/engine/shell';
import { createFileLogger, type Logger } from '../src/logging/logger';
import { HostFileStore } from '../src/vfs/host';
import { VERSION_STRING } from '../src/version';

const SOURCE = 'bin/burrow';

function buildProgram(): Command {
  return new Command()
    .name('burrow')
    .description('A sandboxed command-line shell over a single directory tree')
    .version(VERSION_STRING, '-v, --version', 'Show version information')
    .option('-r, --root <dir>', 'directory that becomes / (default: current directory)')
    .option('--log-file <file>', 'event log location (default: <root>/burrow.log)')
    .option('--alias-depth <n>', 'maximum alias substitutions per command (default: 64)')
    .option('--log-level <level>', 'DEBUG, INFO, WARNING or ERROR (default: DEBUG)')
    .addHelpText('after', `
Inside Burrow:
  help              List every command
  man <command>     Show a command's manual page
  exit              Leave the shell`);
}

function reportFatal(message: string): void {
  console.error(pc.red(`burrow: ${message}`));
}

/**
 * Main CLI entry point.
 *
 * @returns The process exit code
 */
async function main(argv: string[]): Promise<number> {
  const program = buildProgram();
  program.parse(argv);

  let config: ShellConfig;
  let logger: Logger;
  try {
    config = resolveConfig(program.opts<ConfigFlags>());
    logger = createFileLogger(config.logFile, { level: config.logLevel });
  } catch (error) {
    reportFatal(errorMessage(error));
    return 1;
  }

  logger.info(SOURCE, `starting ${VERSION_STRING} (root ${config.root}, log ${config.logFile})`);

  const terminal = createNodeTerminalAPI();
  try {
    const shell = new ShellEngine(terminal, {
      fs: new HostFileStore(config.root),
      logger,
      aliasDepth: config.aliasDepth,
    });

    terminal.writeln(`${VERSION_STRING} - type 'help' for commands, 'exit' to leave`);
    return await shell.run();
  } catch (error) {
    logger.error(SOURCE, `fatal: ${errorMessage(error)}`, error);
    reportFatal(errorMessage(error));
    return 1;
  } finally {
    terminal.dispose();
  }
}

main(process.argv).then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    reportFatal(errorMessage(error));
    process.exitCode = 1;
  }
);
