import { Option, type Command } from 'commander';
import { addCommonOptions, createCliContext, type CommonOptions } from '../container.js';
import { OutputFormatter } from '../formatters/OutputFormatter.js';

interface GetOptions extends CommonOptions {
  format: 'json' | 'text' | 'html';
}

/**
 * 註冊 get 指令
 *
 * 用法：
 *   docshelf get architecture/overview.md [--format json|text|html]
 */
export function registerGetCommand(program: Command): void {
  addCommonOptions(
    program
      .command('get <path>')
      .description('Print one document (raw markdown, JSON response or full HTML page)'),
  )
    .addOption(new Option('--format <format>', 'Output format').choices(['json', 'text', 'html']).default('text'))
    .action(async (docPath: string, opts: GetOptions) => {
      const ctx = createCliContext(opts);

      if (opts.format === 'html') {
        const fetched = await ctx.fetcher.fetch(ctx.config.docsRoot, docPath, 'html');
        if (fetched.kind === 'html') {
          process.stdout.write(fetched.page);
        }
        return;
      }

      const { document } = await ctx.fetcher.fetch(ctx.config.docsRoot, docPath, 'json');
      const formatter = new OutputFormatter();
      process.stdout.write(formatter.formatDocument(document, opts.format === 'json' ? 'json' : 'text') + '\n');
    });
}
