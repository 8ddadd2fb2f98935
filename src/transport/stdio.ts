import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { Logger } from '../logging.js';
import type { RpcDispatcher } from '../mcp/dispatcher.js';
import { rpcFailure } from '../mcp/envelope.js';
import { ErrorCode, describeError } from '../mcp/errors.js';

export interface LineLoopStats {
  received: number;
  answered: number;
}

function writeLine(output: Writable, line: string): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(`${line}\n`, (error) => (error ? reject(error) : resolve()));
  });
}

// A failure answering one line becomes that line's error response.
async function answerLine(dispatcher: RpcDispatcher, line: string, logger: Logger): Promise<string> {
  try {
    return JSON.stringify(await dispatcher.handleRaw(line));
  } catch (error) {
    logger.error({ err: describeError(error) }, 'failed to answer line');
    return JSON.stringify(rpcFailure(null, ErrorCode.InternalError, `internal error: ${describeError(error)}`));
  }
}

/**
 * Newline-delimited JSON-RPC over a pair of streams. Lines are handled one at
 * a time: the next line is not read until the previous response is written.
 * Resolves on end of input or a read or write error.
 */
export async function runLineLoop(
  dispatcher: RpcDispatcher,
  input: Readable,
  output: Writable,
  logger: Logger
): Promise<LineLoopStats> {
  const stats: LineLoopStats = { received: 0, answered: 0 };
  const lines = createInterface({ input, crlfDelay: Infinity, terminal: false });
  logger.info('stdio loop started');

  try {
    for await (const line of lines) {
      if (line.trim() === '') continue;
      stats.received += 1;

      await writeLine(output, await answerLine(dispatcher, line, logger));
      stats.answered += 1;
    }
  } catch (error) {
    logger.error({ err: describeError(error) }, 'stdio loop stopped on stream error');
  } finally {
    lines.close();
  }

  logger.info(stats, 'stdio loop finished');
  return stats;
}
