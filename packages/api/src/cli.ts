import chalk from 'chalk';
import Table from 'cli-table3';
import { loadConfig, createLogger } from '@quill/shared';
import { createServices } from './context.js';
import { startServer } from './server.js';
import { formatDelta, formatEngagement, scoreBand, scoreRows, type ScoreBand } from './format.js';

const BAND_COLORS: Record<ScoreBand, (text: string) => string> = {
  strong: chalk.green,
  fair: chalk.yellow,
  weak: chalk.red,
};

const print = {
  header: (text: string) => console.log('\n' + chalk.bold.cyan(`  ${text}`)),
  success: (text: string) => console.log(chalk.green(`  ✓ ${text}`)),
  info: (text: string) => console.log(chalk.blue(`  ℹ ${text}`)),
  error: (text: string) => console.error(chalk.red(`  ✗ ${text}`)),
  dim: (text: string) => console.log(chalk.dim(`    ${text}`)),
};

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === '--help' || command === '-h') {
    printHelp();
    return;
  }

  const config = loadConfig();
  const logger = createLogger('quill', config.logLevel);

  switch (command) {
    case 'score': {
      const text = readText(args);
      const { virality } = createServices(config, logger);
      const result = virality.score(text, getFlag(args, '--platform'));

      print.header('Virality Score');
      const table = new Table({ head: [chalk.cyan('Signal'), chalk.cyan('Score')], colWidths: [14, 10] });
      for (const [label, score] of scoreRows(result)) {
        table.push([label, BAND_COLORS[scoreBand(score)](String(score))]);
      }
      console.log(table.toString());
      print.info(`Predicted engagement: ${formatEngagement(result.predictedEngagement)}`);
      for (const rec of result.recommendations) print.dim(`• ${rec}`);
      break;
    }

    case 'rewrite': {
      const text = readText(args);
      const { virality } = createServices(config, logger);
      const result = virality.rewrite(text, getFlag(args, '--platform'));

      print.header('Rewrite');
      console.log(`\n${result.rewrittenText}\n`);
      print.success(`Overall ${formatDelta(result)}`);
      for (const line of result.improvements) print.dim(line);
      break;
    }

    case 'serve': {
      print.header(config.appName);
      startServer(config, logger, createServices(config, logger));
      print.success(`Listening on ${chalk.underline(`http://${config.host}:${config.port}`)}`);
      print.dim('Press Ctrl+C to stop');
      break;
    }

    default:
      print.error(`Unknown command: ${command}`);
      printHelp();
      process.exitCode = 1;
  }
}

function printHelp() {
  console.log(`
  quill: virality scoring and content generation

  Usage:
    quill <command> [options]

  Commands:
    score "<text>"             Score text for virality
      --platform <name>        twitter, linkedin, facebook, instagram, reddit,
                               tiktok, newsletter or blog (default: general)
    rewrite "<text>"           Rewrite text for a higher score
      --platform <name>        Target platform
    serve                      Start the HTTP API
  `);
}

function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx >= 0 ? args[idx + 1] : undefined;
}

/** Positional arguments after the command, with flags and their values removed */
function readText(args: string[]): string {
  const words: string[] = [];
  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      i++;
      continue;
    }
    words.push(arg);
  }
  return words.join(' ');
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  print.error(`Error: ${message}`);
  process.exit(1);
});
