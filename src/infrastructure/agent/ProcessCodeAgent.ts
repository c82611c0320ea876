import { spawn } from 'child_process';
import { ICodeAgent } from '../../core/interfaces/ICodeAgent.js';
import { AgentRequest } from '../../core/entities/Review.js';
import { AgentError } from '../../utils/errors.js';

export interface ProcessCodeAgentOptions {
  command: string;
  args: string[];
  timeoutMs: number;
  workdir?: string;
}

/**
 * Command line for one agent run: configured args, then model and instruction
 */
export function buildAgentArgs(baseArgs: readonly string[], request: AgentRequest): string[] {
  return [...baseArgs, '--model', request.model, '--message', request.instruction];
}

/**
 * Extra environment for one agent run. Repository coordinates are only
 * set when the pull-request page revealed them.
 */
export function buildAgentEnv(request: AgentRequest): Record<string, string> {
  const env: Record<string, string> = {};
  if (request.coordinates) {
    env.AGENT_REPO_URL = request.coordinates.repoUrl;
    env.AGENT_BRANCH = request.coordinates.branch;
  }
  return env;
}

/**
 * Runs the external code-modification agent as a child process.
 * Trimmed stdout is the agent's answer.
 */
export class ProcessCodeAgent implements ICodeAgent {
  constructor(private options: ProcessCodeAgentOptions) {}

  run(request: AgentRequest): Promise<string | undefined> {
    const args = buildAgentArgs(this.options.args, request);

    return new Promise((resolve, reject) => {
      const child = spawn(this.options.command, args, {
        cwd: this.options.workdir,
        env: { ...process.env, ...buildAgentEnv(request) },
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';

      // Set a timeout for forceful kill
      const killTimeout = setTimeout(() => {
        if (!child.killed) {
          console.error(`[CodeAgent] Timed out after ${this.options.timeoutMs}ms, killing agent`);
          child.kill('SIGKILL');
        }
      }, this.options.timeoutMs);

      // Decode as a stream: a multi-byte character may span two chunks
      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');

      child.stdout.on('data', (data: string) => {
        stdout += data;
      });

      child.stderr.on('data', (data: string) => {
        stderr += data;
      });

      child.on('error', (error: Error) => {
        clearTimeout(killTimeout);
        reject(new AgentError(`Failed to start ${this.options.command}: ${error.message}`));
      });

      child.on('close', (code: number | null) => {
        clearTimeout(killTimeout);

        if (code !== 0) {
          const tail = stderr.trim().split('\n').slice(-5).join('\n');
          reject(new AgentError(`Agent exited with code ${code}: ${tail}`, code));
          return;
        }

        const output = stdout.trim();
        resolve(output.length > 0 ? output : undefined);
      });
    });
  }
}
