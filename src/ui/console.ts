import chalk from 'chalk';

/**
 * User-facing terminal output. Diagnostics for later inspection go through
 * the pino logger instead.
 */
export interface Reporter {
  info(message: string): void;
  success(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  /** Rewrites the current terminal line in place. */
  progress(message: string): void;
  divider(): void;
  header(outputRoot: string): void;
  clear(): void;
}

const BANNER = [
  '        _     _                 _     ',
  ' __   _(_) __| | __ _ _ __ __ _| |__  ',
  ' \\ \\ / / |/ _` |/ _` | \'__/ _` | \'_ \\ ',
  '  \\ V /| | (_| | (_| | | | (_| | |_) |',
  '   \\_/ |_|\\__,_|\\__, |_|  \\__,_|_.__/ ',
  '                |___/                 ',
];

const DIVIDER_WIDTH = 60;

export function createConsoleReporter(out: NodeJS.WritableStream = process.stdout): Reporter {
  let inPlace = false;

  const writeLine = (text: string) => {
    if (inPlace) {
      out.write('\n');
      inPlace = false;
    }
    out.write(`${text}\n`);
  };

  return {
    info: (message) => writeLine(`${chalk.cyan('[*]')} ${message}`),
    success: (message) => writeLine(`${chalk.green('[+]')} ${message}`),
    warning: (message) => writeLine(`${chalk.yellow('[*]')} ${chalk.yellow(message)}`),
    error: (message) => writeLine(`${chalk.red('[!]')} ${chalk.red(message)}`),
    progress: (message) => {
      out.write(`\r${message}`);
      inPlace = true;
    },
    divider: () => writeLine(chalk.gray('='.repeat(DIVIDER_WIDTH))),
    header: (outputRoot) => {
      for (const line of BANNER) writeLine(chalk.bold.cyan(line));
      writeLine('');
      writeLine(`${chalk.cyan('[*]')} Universal Video Downloader - Highest Quality MP4`);
      writeLine(`${chalk.cyan('[*]')} Download videos in best MP4 quality using yt-dlp`);
      writeLine(`${chalk.cyan('[*]')} Supports: YouTube, Facebook, TikTok, Instagram, Twitter, etc.`);
      writeLine(`${chalk.cyan('[*]')} Paste any video URL. Type 'exit' to quit.`);
      writeLine(`${chalk.cyan('[*]')} Type 'clear' to clear the screen.`);
      writeLine(`${chalk.cyan('[*]')} Downloading to: ${outputRoot}`);
      writeLine(chalk.gray('-'.repeat(DIVIDER_WIDTH)));
    },
    clear: () => {
      // ANSI: clear screen, move cursor home
      out.write('\x1b[2J\x1b[H');
      inPlace = false;
    },
  };
}
