// addlinks command - rewrite file references in text into hosting-site links

import { Command } from 'commander';
import type { Readable, Writable } from 'stream';
import { HOSTING_ROOT, parseHostingRoot, resolveLinkerOptions } from '../../core/config.js';
import { logger, LogLevel } from '../../core/logger.js';
import type { LinkerOptions } from '../../core/schemas.js';
import { SimpleGitService, type GitService } from '../../services/git/git-service.js';
import { readLines, writeLine } from '../../services/input/line-reader.js';
import { LocationLinker } from '../../services/linker/location-linker.js';
import { loadRepositoryContext } from '../../services/linker/repository-context.js';
import { MANUAL } from '../manual.js';
import { handleError } from '../utils/error-handler.js';

export const VERSION = '0.1.0';

/**
 * Streams and collaborators the command runs against
 */
export interface AddLinksEnvironment {
  stdin: Readable;
  stdout: Writable;
  git: GitService;
  hostingRoot: string;
}

export function defaultEnvironment(): AddLinksEnvironment {
  return {
    stdin: process.stdin,
    stdout: process.stdout,
    git: new SimpleGitService(),
    hostingRoot: HOSTING_ROOT
  };
}

/**
 * Filter the input and return the exit code
 *
 * @throws RepositoryError when not inside a clone of the hosting repository
 */
export async function runAddLinks(
  files: string[],
  options: LinkerOptions,
  env: AddLinksEnvironment
): Promise<number> {
  if (options.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  if (options.man) {
    env.stdout.write(MANUAL);
    return 0;
  }

  const hosting = parseHostingRoot(env.hostingRoot);
  const context = await loadRepositoryContext(env.git, hosting);
  const linker = new LocationLinker(env.git, context, {
    hostingRoot: hosting.root,
    format: options.markdown ? 'markdown' : 'plain',
    permanent: options.permanent
  });

  let exitCode = 0;
  const lines = readLines({
    files,
    stdin: env.stdin,
    onError: error => {
      logger.error(error.message);
      exitCode = error.exitCode;
    }
  });

  for await (const line of lines) {
    if (options.list) {
      for (const link of await linker.listLine(line)) {
        await writeLine(env.stdout, link);
      }
    } else {
      await writeLine(env.stdout, await linker.linkLine(line));
    }
  }

  logger.info('Input processed', linker.getStats());
  return exitCode;
}

/**
 * Build the addlinks command
 */
export function createAddLinksCommand(
  environment: () => AddLinksEnvironment = defaultEnvironment
): Command {
  return new Command('addlinks')
    .description('Turn [revision:]path[:lineno] references into links to the hosted repository')
    .version(VERSION)
    .argument('[files...]', 'files to read instead of standard input')
    .option('-m, --markdown', 'write [reference](link) instead of the bare link')
    .option('-p, --permanent', 'always link to full commit ids')
    .option('-l, --list', 'write only the resolved links, one per line')
    .option('-v, --verbose', 'log git lookups and failures on stderr')
    .option('--man', 'print the full manual')
    .action(async (files: string[], rawOptions: Record<string, unknown>) => {
      try {
        const options = resolveLinkerOptions(rawOptions);
        process.exitCode = await runAddLinks(files, options, environment());
      } catch (error) {
        handleError(error);
      }
    });
}
