export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export type CheckStatus = 'ok' | 'fail';

export type HealthCheckName = 'service-up' | 'root-exists' | 'root-readable' | 'markdown-file-count';

export interface HealthCheckEntry {
  readonly name: HealthCheckName;
  readonly status: CheckStatus;
  readonly detail: string;
}

/** 聚合後的健康檢查結果；整個物件凍結後整體替換，不做欄位層級的修改 */
export interface HealthCheckResult {
  readonly status: HealthStatus;
  readonly service: string;
  readonly checks: readonly HealthCheckEntry[];
  /** ISO 8601 */
  readonly computedAt: string;
}
