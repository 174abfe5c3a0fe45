import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { getFixturePath } from '../../helpers/fixtures.js';

const SAMPLE_LOG = getFixturePath('logs', 'sample.log');

describe('CLI find command', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;
  let exitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    vi.resetModules();
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    exitSpy = vi.spyOn(process, 'exit').mockImplementation((() => undefined) as never);
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    exitSpy.mockRestore();
  });

  function output(): string[] {
    return logSpy.mock.calls.map(c => String(c[0]));
  }

  describe('human-readable output', () => {
    it('prints every execution with caller, timestamp and parameters', async () => {
      const { findCommand } = await import('../../../src/cli/commands/find.js');
      await findCommand.parseAsync([SAMPLE_LOG, '1a2b', '-e', 'utf-8'], { from: 'user' });

      expect(output().slice(0, 10)).toEqual([
        'Found 2 execution(s) for id=1a2b\n',
        'Execution 1/2 [id=1a2b]',
        '  Caller:    UserDao',
        '  Logger:    jp.co.example.db.SqlLogger',
        '  Timestamp: 2024/01/15 09:00:01',
        '  SQL:',
        "SELECT *\nFROM users\nWHERE id = 42\nAND status = 'active'",
        '  Parameters:',
        '  [1] Int: 42\n  [2] String: active',
        '',
      ]);
      expect(exitSpy).not.toHaveBeenCalled();
    });

    it('prints SQL on one line with --no-pretty', async () => {
      const { findCommand } = await import('../../../src/cli/commands/find.js');
      await findCommand.parseAsync([SAMPLE_LOG, '1a2b', '-e', 'utf-8', '--no-pretty'], { from: 'user' });

      expect(output()).toContain("SELECT * FROM users WHERE id = 7 AND status = 'locked'");
    });

    it('warns when a parameter set cannot be substituted', async () => {
      const { findCommand } = await import('../../../src/cli/commands/find.js');
      await findCommand.parseAsync([SAMPLE_LOG, '3c4d', '-e', 'utf-8'], { from: 'user' });

      expect(output().join('\n')).toContain(
        'Unsupported parameter type "Timestamp" at position 1 (showing unfilled template)'
      );
    });
  });

  describe('JSON output', () => {
    it('prints executions as JSON', async () => {
      const { findCommand } = await import('../../../src/cli/commands/find.js');
      await findCommand.parseAsync([SAMPLE_LOG, '1a2b', '-e', 'utf-8', '--json'], { from: 'user' });

      const parsed: unknown = JSON.parse(output().join('\n'));
      expect(parsed).toEqual([
        expect.objectContaining({
          id: '1a2b',
          sequenceIndex: 1,
          callerName: 'UserDao',
          filledSql: "SELECT * FROM users WHERE id = 42 AND status = 'active'",
          fillIssue: null,
          parameters: [
            { kind: 'integer', typeName: 'Int', position: 1, rawValue: '42' },
            { kind: 'string', typeName: 'String', position: 2, rawValue: 'active' },
          ],
        }),
        expect.objectContaining({ sequenceIndex: 2, timestamp: '2024/01/15 09:00:07' }),
      ]);
    });
  });

  describe('errors', () => {
    it('exits with code 1 for an unknown ID', async () => {
      const { findCommand } = await import('../../../src/cli/commands/find.js');
      await findCommand.parseAsync([SAMPLE_LOG, 'ffff', '-e', 'utf-8'], { from: 'user' });

      expect(errorSpy).toHaveBeenCalledWith('ID not found: ffff');
      expect(exitSpy).toHaveBeenCalledWith(1);
    });

    it('exits with code 1 for a missing log file', async () => {
      const { findCommand } = await import('../../../src/cli/commands/find.js');
      await findCommand.parseAsync(['/non/existent/app.log', '1a2b', '-e', 'utf-8'], { from: 'user' });

      expect(errorSpy.mock.calls[0]?.[0]).toBe('Error:');
      expect(String(errorSpy.mock.calls[0]?.[1])).toContain('Log file not found');
      expect(exitSpy).toHaveBeenCalledWith(1);
    });

    it('rejects an unsupported encoding', async () => {
      const { findCommand } = await import('../../../src/cli/commands/find.js');
      await findCommand.parseAsync([SAMPLE_LOG, '1a2b', '-e', 'latin-1'], { from: 'user' });

      expect(String(errorSpy.mock.calls[0]?.[1])).toContain('Unsupported encoding: latin-1');
      expect(exitSpy).toHaveBeenCalledWith(1);
    });
  });
});
