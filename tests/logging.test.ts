import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { LogVerbosity } from '../src/config/types.js';
import { createLogger, levelForVerbosity, pruneLogs } from '../src/logging.js';

describe('logging', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'swarmup-logs-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('maps verbosity 1-4 onto logger levels', () => {
    const verbosities: LogVerbosity[] = [1, 2, 3, 4];
    expect(verbosities.map(levelForVerbosity)).toEqual(['error', 'warn', 'info', 'debug']);
  });

  it('creates the log directory and one transport per log file', () => {
    const logDir = path.join(dir, 'nested');
    const logger = createLogger({ verbosity: 2, logDir, console: false });

    expect(fs.existsSync(logDir)).toBe(true);
    expect(logger.level).toBe('warn');
    expect(logger.transports).toHaveLength(2);
    logger.close();
  });

  it('keeps a silent transport when console and files are both off', () => {
    const logger = createLogger({ verbosity: 3, console: false });

    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0].silent).toBe(true);
  });

  describe('pruneLogs', () => {
    it('removes only .log files older than the cutoff', () => {
      const now = Date.now();
      const old = path.join(dir, 'setup.log');
      const recent = path.join(dir, 'errors.log');
      const other = path.join(dir, 'notes.txt');
      for (const file of [old, recent, other]) fs.writeFileSync(file, 'x');

      const tenDaysAgo = (now - 10 * 24 * 60 * 60 * 1000) / 1000;
      fs.utimesSync(old, tenDaysAgo, tenDaysAgo);
      fs.utimesSync(other, tenDaysAgo, tenDaysAgo);

      expect(pruneLogs(dir, 7, now)).toEqual([old]);
      expect(fs.readdirSync(dir).sort()).toEqual(['errors.log', 'notes.txt']);
    });

    it('returns nothing for a missing directory', () => {
      expect(pruneLogs(path.join(dir, 'absent'))).toEqual([]);
    });
  });
});
