/**
 * Tests for the child process helpers
 */
import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { OutputCapture, run, waitForClose } from '../../../src/services/ffmpeg/process';
import { FakeChildProcess, createFakeSpawn, nextTurn } from '../../mocks/fakeChildProcess';

describe('process helpers', () => {
  describe('run', () => {
    it('should collect stdout and stderr and the exit code', async () => {
      const { spawn } = createFakeSpawn(async child => {
        child.write('12.5\n');
        child.writeDiagnostics('warning\n');
        await child.complete(0);
      });

      await expect(run('ffprobe', ['-v', 'error'], spawn)).resolves.toEqual({
        stdout: '12.5\n',
        stderr: 'warning\n',
        code: 0
      });
      expect(spawn).toHaveBeenCalledWith('ffprobe', ['-v', 'error'], {
        stdio: ['ignore', 'pipe', 'pipe']
      });
    });

    it('should resolve with a null code when the binary cannot be started', async () => {
      const { spawn } = createFakeSpawn(child => {
        child.fail(new Error('spawn ffprobe ENOENT'));
      });

      await expect(run('ffprobe', [], spawn)).resolves.toEqual({
        stdout: '',
        stderr: 'spawn ffprobe ENOENT',
        code: null
      });
    });

    it('should resolve with a null code when spawn throws', async () => {
      const { spawn } = createFakeSpawn();
      spawn.mockImplementationOnce(() => {
        throw new Error('EACCES');
      });

      await expect(run('ffprobe', [], spawn)).resolves.toEqual({ stdout: '', stderr: 'EACCES', code: null });
    });
  });

  describe('waitForClose', () => {
    it('should settle with the exit code and signal', async () => {
      const child = new FakeChildProcess();
      const closed = waitForClose(child);

      child.kill('SIGKILL');

      await expect(closed).resolves.toEqual({ code: null, signal: 'SIGKILL' });
    });
  });

  describe('OutputCapture', () => {
    it('should keep only the first bytes up to the limit', async () => {
      const stream = new PassThrough();
      const capture = new OutputCapture(stream, 5);

      stream.write('abc');
      stream.write('defgh');
      stream.end();
      await nextTurn();

      expect(capture.text()).toBe('abcde');
      expect(capture.truncated).toBe(true);
    });

    it('should tolerate a missing stream', () => {
      const capture = new OutputCapture(null, 10);

      expect(capture.text()).toBe('');
      expect(capture.truncated).toBe(false);
    });
  });
});
