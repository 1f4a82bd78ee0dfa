#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { registerServeCommand } from './commands/serve.js';
import { registerListCommand } from './commands/list.js';
import { registerGetCommand } from './commands/get.js';
import { registerHealthCommand } from './commands/health.js';
import { registerMcpCommand } from './commands/mcp.js';
import { version } from './version.js';

const program = new Command();

program
  .name('docshelf')
  .description('Serve a directory of markdown documentation over HTTP, the command line and MCP')
  .version(version);

/** 全域錯誤處理（需在註冊子指令前設定，子指令才會繼承） */
program.exitOverride();

registerServeCommand(program);
registerListCommand(program);
registerGetCommand(program);
registerHealthCommand(program);
registerMcpCommand(program);

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err: unknown) {
    if (err instanceof CommanderError) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        process.exit(0);
      }
      // commander 已自行輸出錯誤訊息
      process.exit(err.exitCode);
    }
    process.stderr.write(`Error: ${err instanceof Error ? err.message : 'Unknown error'}\n`);
    process.exit(1);
  }
}

await main();
