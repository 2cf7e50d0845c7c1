import { describe, it, expect } from 'vitest';
import { ProcessLaunchError, ProcessTimeoutError } from './errors';
import { NodeProcessRunner, spawnCommand } from './process';
import type { CommandStep } from './wavedromCli';

function script(source: string): CommandStep {
  return { executable: process.execPath, args: ['-e', source] };
}

describe('NodeProcessRunner', () => {
  const runner = new NodeProcessRunner();

  it('captures stdout and stderr separately with the exit code', async () => {
    const outcome = await runner.run(
      script("process.stdout.write('rendered'); process.stderr.write('bad wave'); process.exitCode = 3;"),
    );

    expect(outcome).toEqual({ exitCode: 3, signal: null, stdout: 'rendered', stderr: 'bad wave' });
  });

  it('reports a clean exit', async () => {
    const outcome = await runner.run(script(''), { timeoutMs: 10000 });

    expect(outcome).toEqual({ exitCode: 0, signal: null, stdout: '', stderr: '' });
  });

  it.skipIf(process.platform === 'win32')('reports the signal that ended the process', async () => {
    const outcome = await runner.run(script("process.kill(process.pid, 'SIGTERM')"));

    expect(outcome.exitCode).toBeNull();
    expect(outcome.signal).toBe('SIGTERM');
  });

  it('kills the process when the timeout expires', async () => {
    const run = runner.run(script('setTimeout(() => {}, 10000)'), { timeoutMs: 200 });

    await expect(run).rejects.toBeInstanceOf(ProcessTimeoutError);
    await expect(run).rejects.toThrow('did not finish within 200ms and was killed');
  });

  it('rejects with a launch error when the executable does not exist', async () => {
    const run = runner.run({ executable: '/nonexistent/wavedrom-cli', args: [] });

    await expect(run).rejects.toBeInstanceOf(ProcessLaunchError);
    await expect(run).rejects.toThrow('Failed to launch "/nonexistent/wavedrom-cli"');
  });
});

describe('spawnCommand', () => {
  const step: CommandStep = {
    executable: 'C:\\npm\\wavedrom-cli.CMD',
    args: ['-i', 'bus.wjson', '-s', 'bus.svg'],
  };

  it('runs Windows batch shims through cmd', () => {
    expect(spawnCommand(step, 'win32')).toEqual({
      executable: 'cmd',
      args: ['/d', '/c', 'C:\\npm\\wavedrom-cli.CMD', '-i', 'bus.wjson', '-s', 'bus.svg'],
    });
  });

  it('spawns executables directly', () => {
    const exe = { executable: 'C:\\Program Files\\Inkscape\\inkscape.exe', args: ['a.svg'] };
    expect(spawnCommand(exe, 'win32')).toEqual({ executable: exe.executable, args: ['a.svg'] });
    expect(spawnCommand({ executable: '/usr/bin/wavedrom-cli', args: ['-i', 'a'] }, 'linux')).toEqual({
      executable: '/usr/bin/wavedrom-cli',
      args: ['-i', 'a'],
    });
  });

  it('only treats batch files specially on Windows', () => {
    expect(spawnCommand(step, 'linux').executable).toBe(step.executable);
  });
});
