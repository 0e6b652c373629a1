import * as readline from 'readline';
import { logger } from '../core/logger';
import { getErrorMessage } from '../core/errors';
import type { DownloaderContext } from '../core/context';
import { processUrl } from './task';
import type { UrlHandler } from './types';

export interface InteractiveIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  /** Treat input as a terminal, so Ctrl-C arrives as a keypress. Defaults to `output.isTTY`. */
  terminal?: boolean;
}

const PROMPT = '\n[*] Enter Video URL: ';
const EXIT_COMMANDS = new Set(['exit', 'quit', 'q']);
const CLEAR_COMMANDS = new Set(['clear', 'cls']);

/**
 * Prompt loop. Ctrl-C cancels the running download and leaves the loop;
 * end of input leaves it as well.
 */
export async function runInteractive(
  ctx: DownloaderContext,
  io: InteractiveIO = { input: process.stdin, output: process.stdout },
  handle: UrlHandler = processUrl
): Promise<void> {
  const { reporter, settings } = ctx;
  const rl = readline.createInterface({
    input: io.input,
    output: io.output,
    ...(io.terminal === undefined ? {} : { terminal: io.terminal }),
  });
  let current: AbortController | null = null;
  let interrupted = false;
  let saidGoodbye = false;
  let closed = false;

  rl.on('close', () => {
    closed = true;
  });
  rl.on('SIGINT', () => {
    interrupted = true;
    current?.abort();
    rl.close();
  });

  reporter.header(settings.outputRoot);
  rl.setPrompt(PROMPT);
  rl.prompt();

  for await (const line of rl) {
    const input = line.trim();
    const command = input.toLowerCase();

    if (EXIT_COMMANDS.has(command)) {
      reporter.info('Goodbye!');
      saidGoodbye = true;
      break;
    }

    if (CLEAR_COMMANDS.has(command)) {
      reporter.clear();
      reporter.header(settings.outputRoot);
    } else if (input.length > 0) {
      const controller = new AbortController();
      current = controller;
      try {
        await handle(input, { ...ctx, signal: controller.signal });
      } catch (error) {
        logger.error({ url: input, error }, 'Interactive task failed');
        reporter.error(`Error: ${getErrorMessage(error)}`);
      } finally {
        current = null;
      }
    }

    if (interrupted) break;
    // Lines already read are still delivered after end of input
    if (!closed) rl.prompt();
  }

  if (!closed) rl.close();
  if (!saidGoodbye) reporter.info('Exiting...');
}
