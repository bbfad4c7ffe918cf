/**
 * Tests for external program handling.
 */

import { describe, it, expect } from 'vitest';
import { ConfigError, SpawnFailedError } from '../errors.js';
import { LogLevel } from '../observability.js';
import { RecordingLogger } from '../__mocks__/logger.js';
import { SpawnProcessRunner, describeExit, formatCommand, parseCommand } from '../process.js';

describe('parseCommand', () => {
  it('should split on whitespace', () => {
    expect(parseCommand('diff -u')).toEqual(['diff', '-u']);
    expect(parseCommand('  sort   -r ')).toEqual(['sort', '-r']);
  });

  it('should group quoted words', () => {
    expect(parseCommand(`grep -v 'a b'`)).toEqual(['grep', '-v', 'a b']);
    expect(parseCommand('jq -S "."')).toEqual(['jq', '-S', '.']);
    expect(parseCommand('printf a\\ b')).toEqual(['printf', 'a b']);
  });

  it('should keep variables and globs literally', () => {
    expect(parseCommand('echo $HOME')).toEqual(['echo', '$HOME']);
    expect(parseCommand('ls *.xml')).toEqual(['ls', '*.xml']);
  });

  it('should reject shell operators', () => {
    expect(() => parseCommand('sort | uniq')).toThrow(
      'Unsupported shell operator "|" in command: sort | uniq'
    );
    expect(() => parseCommand('sort > out.txt')).toThrow(ConfigError);
    expect(() => parseCommand('sort; rm -rf x')).toThrow(ConfigError);
  });

  it('should reject comments', () => {
    expect(() => parseCommand('sort # by name')).toThrow(ConfigError);
  });

  it('should reject an empty command', () => {
    expect(() => parseCommand('   ')).toThrow('Command must not be empty');
  });
});

describe('formatCommand', () => {
  it('should leave plain tokens alone', () => {
    expect(formatCommand(['diff', '-u', '/tmp/1.xml'])).toBe('diff -u /tmp/1.xml');
  });

  it('should quote tokens with whitespace and empty tokens', () => {
    expect(formatCommand(['curl', '--header', 'Authorization: Bearer [REDACTED]', ''])).toBe(
      `curl --header 'Authorization: Bearer [REDACTED]' ''`
    );
  });

  it('should escape single quotes inside quoted tokens', () => {
    expect(formatCommand(["it's here"])).toBe(`'it'\\''s here'`);
  });
});

describe('describeExit', () => {
  it('should describe exit codes and signals', () => {
    const base = { stdout: Buffer.alloc(0), stderr: '' };
    expect(describeExit({ ...base, exitCode: 2, signal: null })).toBe('exited with code 2');
    expect(describeExit({ ...base, exitCode: null, signal: 'SIGTERM' })).toBe('terminated by SIGTERM');
    expect(describeExit({ ...base, exitCode: null, signal: null })).toBe('exited with code unknown');
  });
});

describe('SpawnProcessRunner', () => {
  const node = process.execPath;

  it('should pipe input through the program', async () => {
    const runner = new SpawnProcessRunner();

    const result = await runner.run([node, '-e', 'process.stdin.pipe(process.stdout)'], {
      input: 'hello\n',
    });

    expect(result.exitCode).toBe(0);
    expect(result.signal).toBeNull();
    expect(result.stdout.toString()).toBe('hello\n');
  });

  it('should capture stderr and the exit code', async () => {
    const runner = new SpawnProcessRunner();

    const result = await runner.run([node, '-e', 'process.stderr.write("bad input"); process.exit(3)']);

    expect(result.exitCode).toBe(3);
    expect(result.stderr).toBe('bad input');
  });

  it('should log the command at debug level', async () => {
    const logger = new RecordingLogger();
    const runner = new SpawnProcessRunner(logger);

    await runner.run([node, '-e', '0']);

    expect(logger.messages(LogLevel.Debug)).toEqual([`exec: ${formatCommand([node, '-e', '0'])}`]);
  });

  it('should fail for a program that does not exist', async () => {
    const runner = new SpawnProcessRunner();

    await expect(runner.run(['gitlab-job-tools-no-such-program'])).rejects.toBeInstanceOf(SpawnFailedError);
  });

  it('should fail for an empty command', async () => {
    const runner = new SpawnProcessRunner();

    await expect(runner.run([])).rejects.toThrow('Failed to launch (none): empty command');
  });
});
