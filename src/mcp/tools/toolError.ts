import { isDocsServiceError } from '../../domain/errors/DomainErrors.js';

/** domain 錯誤轉成 isError 結果；其他錯誤往上拋，交給 SDK 處理 */
export function toolError(err: unknown) {
  if (isDocsServiceError(err)) {
    return {
      content: [{ type: 'text' as const, text: `${err.kind}: ${err.message}` }],
      isError: true,
    };
  }
  throw err;
}
