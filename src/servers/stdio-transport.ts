import { spawn } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';

export interface StdioTarget {
  command: string;
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
}

/** Byte streams to one server: `input` carries its replies, `output` our requests. */
export interface StdioTransport {
  readonly input: Readable;
  readonly output: Writable;
  /** Fires at most once, when the server side goes away. */
  onExit(listener: (detail: string) => void): void;
  dispose(): void;
}

function once(listener: (detail: string) => void): (detail: string) => void {
  let fired = false;
  return (detail) => {
    if (fired) return;
    fired = true;
    listener(detail);
  };
}

export function spawnTransport(target: StdioTarget): StdioTransport {
  const child = spawn(target.command, target.args ?? [], {
    cwd: target.cwd,
    env: { ...process.env, ...target.env },
    stdio: ['pipe', 'pipe', 'inherit'],
  });
  return {
    input: child.stdout,
    output: child.stdin,
    onExit(listener) {
      const fire = once(listener);
      child.once('exit', (code, signal) => fire(signal ? `killed by ${signal}` : `exit code ${code ?? 'unknown'}`));
      child.once('error', (e) => fire(`spawn failed: ${e.message}`));
    },
    dispose() {
      child.stdin.end();
      if (child.exitCode === null && child.signalCode === null) child.kill();
    },
  };
}

/** Transport over existing streams, e.g. a pair of PassThroughs in tests. */
export function streamTransport(input: Readable, output: Writable): StdioTransport {
  return {
    input,
    output,
    onExit(listener) {
      const fire = once(listener);
      input.once('end', () => fire('stream ended'));
      input.once('close', () => fire('stream closed'));
    },
    dispose() {
      output.end();
    },
  };
}
