import { spawn } from 'node:child_process';
import { CrewlineError, type ProcessResult, type ProcessRunOptions, type ProcessRunner } from '@crewline/shared';

/** Runs a command without a shell and buffers its output. */
export class SpawnProcessRunner implements ProcessRunner {
  run(command: string, args: string[], options: ProcessRunOptions = {}): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
      });
      child.stdin.end();

      let stdout = '';
      let stderr = '';
      child.stdout.setEncoding('utf-8');
      child.stderr.setEncoding('utf-8');
      child.stdout.on('data', (chunk: string) => { stdout += chunk; });
      child.stderr.on('data', (chunk: string) => { stderr += chunk; });

      child.on('error', (err) => {
        reject(new CrewlineError(`Failed to start ${command}: ${err.message}`, { cause: err }));
      });
      child.on('close', (code, signal) => {
        resolve({
          exitCode: code ?? 1,
          stdout,
          stderr: signal ? `${stderr}terminated by ${signal}` : stderr,
        });
      });
    });
  }
}
