import type { Command } from 'commander';
import { addCommonOptions, createCliContext, parseInteger, type CommonOptions } from '../container.js';
import { closeHttpServer, startHttpServer } from '../../http/HttpServer.js';
import { version } from '../version.js';

interface ServeOptions extends CommonOptions {
  host?: string;
  port?: number;
}

/**
 * 註冊 serve 指令
 *
 * 用法：
 *   docshelf serve [--docs-root ./docs] [--host 127.0.0.1] [--port 8000]
 */
export function registerServeCommand(program: Command): void {
  addCommonOptions(
    program
      .command('serve')
      .description('Start the HTTP docs server'),
  )
    .option('--host <host>', 'Interface to bind (overrides HOST)')
    .option('--port <number>', 'Port to listen on (overrides PORT)', parseInteger)
    .action(async (opts: ServeOptions) => {
      const ctx = createCliContext(opts, { server: { host: opts.host, port: opts.port } });
      const { config, logger } = ctx;

      logger.info('Docs service initialized', {
        docsRoot: config.docsRoot,
        extensions: config.markdown.extensions,
        cors: config.cors,
      });

      const server = await startHttpServer({
        catalog: ctx.catalog,
        fetcher: ctx.fetcher,
        health: ctx.health,
        docsRoot: config.docsRoot,
        cors: config.cors,
        version,
        logger: logger.child({}, 'HttpServer'),
      }, config.server);

      // 優雅關閉
      const shutdown = (signal: NodeJS.Signals) => {
        logger.info('Shutting down', { signal });
        closeHttpServer(server).then(
          () => process.exit(0),
          (err: unknown) => {
            logger.error('Failed to close HTTP server', { error: err instanceof Error ? err.message : String(err) });
            process.exit(1);
          },
        );
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });
}
