// src/tests/bootstrap.test.ts
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as winston from 'winston';
import { bootstrap } from '../cli/bootstrap';
import logger, { Logger } from '../utils/logger';

describe('bootstrap', () => {
  let workDir: string;
  let logConfigPath: string;
  let logDirectory: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bootstrap-'));
    logConfigPath = path.join(workDir, 'log-config.json');
    logDirectory = path.join(workDir, 'logs');
    fs.writeFileSync(logConfigPath, JSON.stringify({
      appendTimestamp: false,
      logLevel: 'info',
      enableWarningLog: false,
      logDirectory
    }));
  });

  afterEach(() => {
    // Back to the console-only test logger
    Logger.initialize({ profile: 'Default' }, false);
    logger.level = 'error';
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('should keep logging on the console when LOG_FILES is false', () => {
    const config = bootstrap({ env: { LOG_FILES: 'false', LOG_LEVEL: 'warn' }, logConfigPath });

    expect(config.logFiles).toBe(false);
    expect(logger.transports).toHaveLength(1);
    expect(logger.level).toBe('warn');
    expect(fs.existsSync(logDirectory)).toBe(false);
  });

  it('should add combined and error log files when LOG_FILES is true', async () => {
    bootstrap({ env: { LOG_FILES: 'true', LOG_LEVEL: 'error' }, logConfigPath });

    const fileTransports = logger.transports.filter(transport => transport instanceof winston.transports.File);
    expect(fileTransports).toHaveLength(2);

    await Promise.all(fileTransports.map(transport => new Promise(resolve => transport.once('open', resolve))));
    expect(fs.readdirSync(logDirectory).sort()).toEqual(['combined.log', 'error.log']);
  });

  it('should take the level from log-config.json without LOG_LEVEL', () => {
    bootstrap({ env: { LOG_FILES: 'false' }, logConfigPath });

    expect(logger.level).toBe('info');
  });
});
