import { Command } from 'commander';
import { generateCommand } from './commands/generate.js';
import { stationsCommand } from './commands/stations.js';
import { serveCommand } from './commands/serve.js';
import { healthCommand } from './commands/health.js';
import { configureLoggers } from './lib/logger.js';
import { getConfigService } from './services/config.js';

export const cli = new Command();

cli
  .name('tide-cal')
  .description('Taiwan tide forecast calendar (iCal) powered by CWA open data')
  .version('0.1.0');

// 全域選項
cli
  .option('-f, --format <format>', '輸出格式: json (default) | table', 'json')
  .option('-v, --verbose', '詳細模式');

// CLI 模式下日誌一律寫到 stderr，stdout 只留給輸出結果
cli.hook('preAction', (thisCommand) => {
  const verbose = thisCommand.opts().verbose === true;
  configureLoggers({
    stderr: true,
    minLevel: verbose ? 'debug' : getConfigService().getLogLevel() ?? 'warn',
  });
});

// 註冊指令
cli.addCommand(generateCommand);
cli.addCommand(stationsCommand);
cli.addCommand(serveCommand);
cli.addCommand(healthCommand);
