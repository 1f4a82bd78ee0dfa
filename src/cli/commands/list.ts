import { Option, type Command } from 'commander';
import { addCommonOptions, createCliContext, type CommonOptions } from '../container.js';
import { OutputFormatter, type OutputFormat } from '../formatters/OutputFormatter.js';

interface ListOptions extends CommonOptions {
  category?: string;
  format: OutputFormat;
}

/** 註冊 list 指令 */
export function registerListCommand(program: Command): void {
  addCommonOptions(
    program
      .command('list')
      .description('List markdown documents under the docs root'),
  )
    .option('--category <name>', 'Only documents in this top-level directory')
    .addOption(new Option('--format <format>', 'Output format').choices(['json', 'text']).default('text'))
    .action(async (opts: ListOptions) => {
      const ctx = createCliContext(opts);
      const refs = await ctx.catalog.list(ctx.config.docsRoot, opts.category);

      const formatter = new OutputFormatter();
      process.stdout.write(formatter.formatDocList(refs, opts.format) + '\n');
    });
}
