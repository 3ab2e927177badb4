// ssh reserves 255 for its own failures (refused, auth, timeout, dropped session)
export const CONNECTION_LOST_EXIT_CODE = 255;

export interface RemoteProcess {
  /** Combined stdout and stderr, one line at a time. */
  output: AsyncIterable<string>;
  exitCode: Promise<number>;
}

export interface CopyResult {
  exitCode: number;
  output: string;
}

export interface RemoteTransport {
  /** Resolves once the host accepts a session; rejects with TransportError otherwise. */
  connect(host: string): Promise<void>;
  exec(host: string, command: string): RemoteProcess;
  copy(host: string, localPath: string, remotePath: string): Promise<CopyResult>;
}
