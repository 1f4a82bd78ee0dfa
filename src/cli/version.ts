import { createRequire } from 'node:module';

// 從 package.json 動態讀取版本號，避免硬編碼導致版本不同步
const require = createRequire(import.meta.url);
export const { version } = require('../../package.json') as { version: string };
