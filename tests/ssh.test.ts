import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { TransportError } from '../src/errors.js';
import { SshTransport } from '../src/remote/ssh.js';

async function collect(lines: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const line of lines) out.push(line);
  return out;
}

describe('SshTransport', () => {
  let dir: string;
  let echoBinary: string;
  let refusedBinary: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'swarmup-ssh-'));
    echoBinary = path.join(dir, 'fake-ssh');
    refusedBinary = path.join(dir, 'refused-ssh');
    fs.writeFileSync(echoBinary, '#!/bin/sh\necho "args: $*"\necho "warning on stderr" >&2\nexit 3\n', { mode: 0o755 });
    fs.writeFileSync(refusedBinary, '#!/bin/sh\necho "Connection refused" >&2\nexit 255\n', { mode: 0o755 });
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const transport = (sshBinary: string) => new SshTransport({
    user: 'ubuntu',
    privateKeyPath: '/keys/id.pem',
    connectTimeoutSec: 10,
    sshBinary,
    scpBinary: sshBinary,
  });

  it('runs non-interactively against user@host and merges both output streams', async () => {
    const proc = transport(echoBinary).exec('10.0.0.1', 'uptime');

    const lines = await collect(proc.output);

    expect(lines.sort()).toEqual([
      'args: -o BatchMode=yes -o StrictHostKeyChecking=accept-new -o ConnectTimeout=10 -i /keys/id.pem ubuntu@10.0.0.1 uptime',
      'warning on stderr',
    ]);
    expect(await proc.exitCode).toBe(3);
  });

  it('copies recursively to host:path', async () => {
    const result = await transport(echoBinary).copy('10.0.0.1', '/local/stacks', '/opt/swarm-setup/stacks');

    expect(result.exitCode).toBe(3);
    expect(result.output.split('\n')).toContain(
      'args: -o BatchMode=yes -o StrictHostKeyChecking=accept-new -o ConnectTimeout=10 -i /keys/id.pem -r /local/stacks ubuntu@10.0.0.1:/opt/swarm-setup/stacks',
    );
  });

  it('reports an unreachable host as a transport error', async () => {
    const attempt = transport(refusedBinary).connect('10.0.0.9');

    await expect(attempt).rejects.toBeInstanceOf(TransportError);
    await expect(attempt).rejects.toThrow(
      'Host is unreachable over SSH | host=10.0.0.9 | operation="connect" | exit code 255\nConnection refused',
    );
  });

  it('rejects the exit code when the client binary is missing', async () => {
    const proc = transport(path.join(dir, 'missing-ssh')).exec('10.0.0.1', 'true');

    expect(await collect(proc.output)).toEqual([]);
    await expect(proc.exitCode).rejects.toBeInstanceOf(TransportError);
  });
});
