import type { ChildProcess } from 'node:child_process';

import { spawn } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { Readable } from 'node:stream';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { spawnAsync } from './spawn-utils';

vi.mock('node:child_process', () => ({
  spawn: vi.fn(),
}));

const spawnMock = vi.mocked(spawn);

function createMockProcess(options?: {
  hasStdout?: boolean;
  hasStderr?: boolean;
}): ChildProcess {
  const emitter = new EventEmitter();
  const proc = emitter as unknown as ChildProcess;

  if (options?.hasStdout !== false) {
    proc.stdout = new Readable({ read() {} }) as ChildProcess['stdout'];
  } else {
    proc.stdout = null;
  }

  if (options?.hasStderr !== false) {
    proc.stderr = new Readable({ read() {} }) as ChildProcess['stderr'];
  } else {
    proc.stderr = null;
  }

  return proc;
}

describe('spawnAsync', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  test('captures stdout and stderr', async () => {
    const proc = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('pdfinfo', ['doc.pdf']);

    proc.stdout!.emit('data', Buffer.from('Pages: 3'));
    proc.stderr!.emit('data', Buffer.from('warning'));
    proc.emit('close', 0, null);

    const result = await promise;

    expect(spawnMock).toHaveBeenCalledWith('pdfinfo', ['doc.pdf'], {});
    expect(result).toEqual({
      stdout: 'Pages: 3',
      stderr: 'warning',
      code: 0,
      signal: null,
    });
  });

  test('concatenates multiple data chunks', async () => {
    const proc = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('pdftotext', ['-bbox-layout', 'doc.pdf', '-']);

    proc.stdout!.emit('data', Buffer.from('<doc>'));
    proc.stdout!.emit('data', Buffer.from('</doc>'));
    proc.emit('close', 0, null);

    const result = await promise;
    expect(result.stdout).toBe('<doc></doc>');
  });

  test('skips capture when disabled', async () => {
    const proc = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('magick', ['in.png', 'out.png'], {
      captureStdout: false,
      captureStderr: false,
    });

    proc.stdout!.emit('data', Buffer.from('ignored'));
    proc.stderr!.emit('data', Buffer.from('ignored'));
    proc.emit('close', 0, null);

    const result = await promise;
    expect(result.stdout).toBe('');
    expect(result.stderr).toBe('');
  });

  test('handles a process without stdio streams', async () => {
    const proc = createMockProcess({ hasStdout: false, hasStderr: false });
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('which', ['pdfimages']);
    proc.emit('close', 0, null);

    const result = await promise;
    expect(result).toEqual({ stdout: '', stderr: '', code: 0, signal: null });
  });

  test('passes spawn options through without capture flags', async () => {
    const proc = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('pdfinfo', ['doc.pdf'], {
      cwd: '/tmp/work',
      timeout: 1000,
      captureStderr: false,
    });
    proc.emit('close', 0, null);
    await promise;

    expect(spawnMock).toHaveBeenCalledWith('pdfinfo', ['doc.pdf'], {
      cwd: '/tmp/work',
      timeout: 1000,
    });
  });

  test('reports a non-zero exit code', async () => {
    const proc = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('pdfinfo', ['missing.pdf']);
    proc.emit('close', 1, null);

    const result = await promise;
    expect(result.code).toBe(1);
  });

  test('reports code 1 and the signal when the process was killed', async () => {
    const proc = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('pdftotext', ['doc.pdf', '-'], {
      timeout: 10,
    });
    proc.emit('close', null, 'SIGTERM');

    const result = await promise;
    expect(result.code).toBe(1);
    expect(result.signal).toBe('SIGTERM');
  });

  test('rejects on spawn error', async () => {
    const proc = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('nonexistent', []);
    proc.emit('error', new Error('spawn nonexistent ENOENT'));

    await expect(promise).rejects.toThrow('spawn nonexistent ENOENT');
  });
});
