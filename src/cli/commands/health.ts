import { Option, type Command } from 'commander';
import { addCommonOptions, createCliContext, type CommonOptions } from '../container.js';
import { OutputFormatter, type OutputFormat } from '../formatters/OutputFormatter.js';
import { toHealthResponse } from '../../application/dto/DocResponses.js';

interface HealthOptions extends CommonOptions {
  format: OutputFormat;
}

/** 註冊 health 指令 */
export function registerHealthCommand(program: Command): void {
  addCommonOptions(
    program
      .command('health')
      .description('Check that the docs root exists, is readable and contains markdown files'),
  )
    .addOption(new Option('--format <format>', 'Output format').choices(['json', 'text']).default('text'))
    .action(async (opts: HealthOptions) => {
      const ctx = createCliContext(opts);
      const result = await ctx.health.check(ctx.config.docsRoot);

      const formatter = new OutputFormatter();
      process.stdout.write(formatter.formatObject(toHealthResponse(result), opts.format) + '\n');
      process.exitCode = result.status === 'healthy' ? 0 : 1;
    });
}
