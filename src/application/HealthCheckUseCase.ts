import path from 'node:path';
import type { DocsFileSystemPort } from '../domain/ports/DocsFileSystemPort.js';
import type {
  HealthCheckEntry,
  HealthCheckName,
  HealthCheckResult,
} from '../domain/entities/HealthCheckResult.js';
import { Logger } from '../shared/Logger.js';

export interface HealthCheckOptions {
  /** 快取存活時間（毫秒），預設 5000 */
  ttlMs?: number;
  serviceName?: string;
  /** 目前時間（毫秒），測試可注入 */
  clock?: () => number;
  logger?: Logger;
}

interface CachedResult {
  rootDir: string;
  storedAt: number;
  result: HealthCheckResult;
}

type CheckOutcome = Omit<HealthCheckEntry, 'name'>;

/**
 * 健康檢查用例：帶 TTL 快取的 docs root 狀態檢查
 *
 * 檢查項目（固定順序）：
 * 1. service-up — 能執行到這裡就是 ok
 * 2. root-exists — docs root 存在且是目錄
 * 3. root-readable — process 可讀取 docs root
 * 4. markdown-file-count — 至少一個 `.md` 檔
 *
 * 快取有效時（同一個 root 且未超過 TTL）直接回傳同一個凍結物件，不碰檔案系統；
 * 過期後重新計算並整個替換。並行呼叫在過期時可能各自重算一次，結果相同，不加鎖。
 * check() 永遠不拋錯，檢查內部的例外會變成 fail 項目。
 */
export class HealthCheckUseCase {
  static readonly DEFAULT_TTL_MS = 5000;
  static readonly DEFAULT_SERVICE_NAME = 'docshelf';

  private readonly ttlMs: number;
  private readonly serviceName: string;
  private readonly clock: () => number;
  private readonly logger: Logger;
  private cached: CachedResult | null = null;

  constructor(
    private readonly fs: DocsFileSystemPort,
    options: HealthCheckOptions = {},
  ) {
    this.ttlMs = options.ttlMs ?? HealthCheckUseCase.DEFAULT_TTL_MS;
    this.serviceName = options.serviceName ?? HealthCheckUseCase.DEFAULT_SERVICE_NAME;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? new Logger('HealthCheck');
  }

  async check(rootDir: string): Promise<HealthCheckResult> {
    const now = this.clock();
    const cached = this.cached;
    if (cached && cached.rootDir === rootDir && now - cached.storedAt < this.ttlMs) {
      return cached.result;
    }

    const result = await this.compute(rootDir);
    const storedAt = this.clock();
    this.cached = { rootDir, storedAt, result };

    if (result.status !== 'healthy') {
      this.logger.warn('health_check_failed', {
        rootDir,
        failed: result.checks.filter((c) => c.status === 'fail').map((c) => c.name),
      });
    }
    return result;
  }

  private async compute(rootDir: string): Promise<HealthCheckResult> {
    const absoluteRoot = path.resolve(rootDir);
    const checks: HealthCheckEntry[] = [];

    checks.push(await this.run('service-up', async () => ({ status: 'ok', detail: 'service is running' })));

    const rootExists = await this.run('root-exists', async () => {
      const info = await this.fs.stat(absoluteRoot);
      if (info === null) return { status: 'fail', detail: `docs root not found: ${absoluteRoot}` };
      if (info.kind !== 'directory') return { status: 'fail', detail: `docs root is not a directory: ${absoluteRoot}` };
      return { status: 'ok', detail: absoluteRoot };
    });
    checks.push(rootExists);

    const rootAvailable = rootExists.status === 'ok';

    checks.push(await this.run('root-readable', async () => {
      if (!rootAvailable) return { status: 'fail', detail: 'skipped: docs root is missing' };
      return (await this.fs.isReadable(absoluteRoot))
        ? { status: 'ok', detail: 'docs root is readable' }
        : { status: 'fail', detail: 'docs root is not readable' };
    }));

    checks.push(await this.run('markdown-file-count', async () => {
      if (!rootAvailable) return { status: 'fail', detail: 'skipped: docs root is missing' };
      const count = (await this.fs.listMarkdownFiles(absoluteRoot)).length;
      return count > 0
        ? { status: 'ok', detail: `${count} markdown files` }
        : { status: 'fail', detail: 'no markdown files found' };
    }));

    const result: HealthCheckResult = {
      status: checks.some((c) => c.status === 'fail') ? 'unhealthy' : 'healthy',
      service: this.serviceName,
      checks: Object.freeze(checks.map((c) => Object.freeze(c))),
      computedAt: new Date(this.clock()).toISOString(),
    };
    return Object.freeze(result);
  }

  private async run(name: HealthCheckName, fn: () => Promise<CheckOutcome>): Promise<HealthCheckEntry> {
    try {
      return { name, ...(await fn()) };
    } catch (err) {
      return { name, status: 'fail', detail: err instanceof Error ? err.message : String(err) };
    }
  }
}
