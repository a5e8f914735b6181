import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { Logger } from '../core/logger.js';
import { errorMessage } from '../core/errors.js';
import { decodeMessage, encodeMessage, toolFailure } from '../protocol/codec.js';
import type { ProtocolMessage, ProtocolMessageOf } from '../protocol/messages.js';
import { ToolExecutor } from '../tools/tool-executor.js';
import type { ToolBackend } from '../tools/tool-types.js';

export interface ServeStdioOptions {
  logger?: Logger;
}

/**
 * Server side of the stdio protocol: answers requests read from `input` on
 * `output` until the input ends or a `shutdown` arrives. Calls run
 * concurrently; a `cancel` aborts the matching call and suppresses its reply.
 */
export async function serveStdio(
  backend: ToolBackend,
  input: Readable,
  output: Writable,
  opts: ServeStdioOptions = {}
): Promise<void> {
  const logger = (opts.logger ?? new Logger()).child(`serve:${backend.name}`);
  const executor = new ToolExecutor(backend, logger);
  const running = new Map<string, AbortController>();
  const lines = createInterface({ input, crlfDelay: Infinity });

  const reply = (msg: ProtocolMessage) => {
    output.write(encodeMessage(msg) + '\n');
  };

  const runCall = async (msg: ProtocolMessageOf<'call_tool'>) => {
    const controller = new AbortController();
    running.set(msg.id, controller);
    try {
      const result = await executor.execute(msg.id, msg.name, msg.arguments, controller.signal);
      reply({ id: msg.id, type: 'call_tool_response', result });
    } catch (e) {
      if (controller.signal.aborted) {
        logger.debug('Call cancelled', { id: msg.id, tool: msg.name });
      } else {
        reply({ id: msg.id, type: 'call_tool_response', result: toolFailure('ToolExecutionError', errorMessage(e)) });
      }
    } finally {
      running.delete(msg.id);
    }
  };

  let shuttingDown = false;
  for await (const line of lines) {
    if (!line.trim()) continue;
    const decoded = decodeMessage(line);
    if (!decoded.ok) {
      logger.warn('Rejected request', { error: decoded.error });
      reply({ id: requestId(line), type: 'error', message: decoded.error });
      continue;
    }
    const msg = decoded.message;
    switch (msg.type) {
      case 'initialize':
        logger.debug('Client connected', { client: msg.client });
        reply({
          id: msg.id,
          type: 'initialize_response',
          server: { name: backend.name, version: backend.version },
          capabilities: { tools: backend.tools.length > 0, resources: (backend.resources?.length ?? 0) > 0 },
        });
        break;
      case 'list_tools':
        reply({ id: msg.id, type: 'list_tools_response', tools: executor.schemas });
        break;
      case 'list_resources':
        reply({ id: msg.id, type: 'list_resources_response', resources: backend.resources ?? [] });
        break;
      case 'call_tool':
        void runCall(msg);
        break;
      case 'cancel':
        running.get(msg.target)?.abort('cancelled by client');
        break;
      case 'shutdown':
        shuttingDown = true;
        for (const c of running.values()) c.abort('server shutting down');
        reply({ id: msg.id, type: 'shutdown_response' });
        break;
      default:
        reply({ id: msg.id, type: 'error', message: `Unexpected message type: ${msg.type}` });
    }
    if (shuttingDown) break;
  }

  lines.close();
  await backend.close?.();
  output.end();
}

function requestId(line: string): string {
  const match = /"id"\s*:\s*"([^"]+)"/.exec(line);
  return match?.[1] ?? 'unknown';
}
