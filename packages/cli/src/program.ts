import { Command } from 'commander';
import { DEFAULT_ROOT, KaTeXValidator, resolveCliOptions, type CliOptions } from '@docmath/core';
import { handleError } from './errors';
import { createLogger, type Logger } from './logger';
import { processTree } from './process';

interface CliFlags {
  script?: string;
  dryRun?: boolean;
  check?: boolean;
  quiet?: boolean;
}

export const EXIT_INVALID_LATEX = 2;

export async function run(options: CliOptions, logger: Logger): Promise<number> {
  const report = await processTree(options.root, {
    logger,
    scriptTag: options.scriptTag,
    dryRun: options.dryRun,
    validator: options.check ? new KaTeXValidator() : undefined,
  });

  logger.info(
    `${report.files.length} files: ${report.converted} converted, ${report.unchanged} unchanged, ${report.regions} regions`
  );

  if (report.issues.length > 0) {
    logger.warn(`${report.issues.length} regions failed LaTeX validation`);
    return EXIT_INVALID_LATEX;
  }
  return 0;
}

export function createProgram(): Command {
  return new Command()
    .name('docmath')
    .description('Rewrite pseudo-math markup in generated HTML documentation into LaTeX')
    .version('0.1.0')
    .argument('[root]', 'directory searched recursively for .html files', DEFAULT_ROOT)
    .option('--script <tag>', 'script line inserted after <head>')
    .option('--dry-run', 'report what would change without writing files')
    .option('--check', 'validate every converted region with KaTeX')
    .option('-q, --quiet', 'only print warnings and errors')
    .action(async (root: string, flags: CliFlags) => {
      let logger = createLogger();
      try {
        const options = resolveCliOptions({
          root,
          scriptTag: flags.script,
          dryRun: flags.dryRun,
          check: flags.check,
          quiet: flags.quiet,
        });
        logger = createLogger({ quiet: options.quiet });
        process.exitCode = await run(options, logger);
      } catch (err) {
        process.exitCode = handleError(err, logger);
      }
    });
}
