import { spawn } from 'child_process';
import { PassThrough } from 'stream';
import { createInterface } from 'readline';
import { TransportError, errorMessage } from '../errors.js';
import { CopyResult, RemoteProcess, RemoteTransport } from './transport.js';

export interface SshTransportConfig {
  user: string;
  privateKeyPath: string;
  connectTimeoutSec: number;
  sshBinary?: string;
  scpBinary?: string;
}

export class SshTransport implements RemoteTransport {
  private config: SshTransportConfig;

  constructor(config: SshTransportConfig) {
    this.config = config;
  }

  private commonOptions(): string[] {
    return [
      '-o', 'BatchMode=yes',
      '-o', 'StrictHostKeyChecking=accept-new',
      '-o', `ConnectTimeout=${this.config.connectTimeoutSec}`,
      '-i', this.config.privateKeyPath,
    ];
  }

  private target(host: string): string {
    return `${this.config.user}@${host}`;
  }

  async connect(host: string): Promise<void> {
    const proc = this.exec(host, 'true');
    const lines: string[] = [];
    for await (const line of proc.output) {
      lines.push(line);
    }
    const exitCode = await proc.exitCode;
    if (exitCode !== 0) {
      throw new TransportError('Host is unreachable over SSH', {
        host,
        operation: 'connect',
        exitCode,
        output: lines.join('\n'),
      });
    }
  }

  exec(host: string, command: string): RemoteProcess {
    const args = [...this.commonOptions(), this.target(host), command];
    return this.run(this.config.sshBinary ?? 'ssh', args, host, 'exec');
  }

  async copy(host: string, localPath: string, remotePath: string): Promise<CopyResult> {
    const args = [...this.commonOptions(), '-r', localPath, `${this.target(host)}:${remotePath}`];
    const proc = this.run(this.config.scpBinary ?? 'scp', args, host, 'copy');
    const lines: string[] = [];
    for await (const line of proc.output) {
      lines.push(line);
    }
    return { exitCode: await proc.exitCode, output: lines.join('\n') };
  }

  private run(binary: string, args: string[], host: string, operation: string): RemoteProcess {
    const proc = spawn(binary, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    const merged = new PassThrough();
    let openStreams = 2;
    const release = () => {
      openStreams--;
      if (openStreams === 0) merged.end();
    };

    proc.stdout.pipe(merged, { end: false });
    proc.stderr.pipe(merged, { end: false });
    proc.stdout.on('end', release);
    proc.stderr.on('end', release);

    const exitCode = new Promise<number>((resolve, reject) => {
      let settled = false;
      proc.on('error', (error) => {
        if (settled) return;
        settled = true;
        merged.end();
        reject(new TransportError(`Failed to start ${binary}`, {
          host,
          operation,
          output: errorMessage(error),
        }));
      });
      proc.on('close', (code, signal) => {
        if (settled) return;
        settled = true;
        resolve(code ?? (signal ? 128 : -1));
      });
    });
    // callers await exitCode after draining output; keep an early spawn failure from surfacing as unhandled
    exitCode.catch(() => undefined);

    return {
      output: createInterface({ input: merged, crlfDelay: Infinity }),
      exitCode,
    };
  }
}
