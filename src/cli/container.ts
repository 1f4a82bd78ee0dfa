import path from 'node:path';
import type { Command } from 'commander';
import { InvalidArgumentError } from 'commander';
import { loadConfig, type DocsConfig, type PartialConfig } from '../config/ConfigLoader.js';
import { FileSystemDocsAdapter } from '../infrastructure/filesystem/FileSystemDocsAdapter.js';
import { PathResolver } from '../infrastructure/filesystem/PathResolver.js';
import { FrontmatterParser } from '../infrastructure/markdown/FrontmatterParser.js';
import { MarkdownRenderer } from '../infrastructure/markdown/MarkdownRenderer.js';
import { DocCatalogUseCase } from '../application/DocCatalogUseCase.js';
import { DocFetchUseCase } from '../application/DocFetchUseCase.js';
import { HealthCheckUseCase } from '../application/HealthCheckUseCase.js';
import { Logger } from '../shared/Logger.js';

/** 所有指令共用的選項 */
export interface CommonOptions {
  baseDir: string;
  docsRoot?: string;
}

export interface CliContext {
  config: DocsConfig;
  logger: Logger;
  catalog: DocCatalogUseCase;
  fetcher: DocFetchUseCase;
  health: HealthCheckUseCase;
}

export function addCommonOptions(command: Command): Command {
  return command
    .option('--base-dir <path>', 'Directory containing .docshelf.json', '.')
    .option('--docs-root <path>', 'Docs root directory (overrides config and DOCS_ROOT)');
}

export function parseInteger(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return Number.parseInt(value, 10);
}

/** 載入設定並組裝 use cases（composition root） */
export function createCliContext(opts: CommonOptions, overrides: PartialConfig = {}): CliContext {
  const baseDir = path.resolve(opts.baseDir);
  const config = loadConfig(baseDir, {
    ...overrides,
    docsRoot: opts.docsRoot ? path.resolve(opts.docsRoot) : overrides.docsRoot,
  });

  const logger = new Logger('docshelf', config.log.level);
  const fs = new FileSystemDocsAdapter(logger.child({}, 'FileSystemDocsAdapter'));
  const parser = new FrontmatterParser();
  const renderer = new MarkdownRenderer(config.markdown.extensions, logger.child({}, 'MarkdownRenderer'));

  return {
    config,
    logger,
    catalog: new DocCatalogUseCase(fs, parser, logger.child({}, 'DocCatalog')),
    fetcher: new DocFetchUseCase(fs, new PathResolver(fs), parser, renderer, logger.child({}, 'DocFetch')),
    health: new HealthCheckUseCase(fs, {
      ttlMs: config.health.cacheTtlMs,
      logger: logger.child({}, 'HealthCheck'),
    }),
  };
}
