/**
 * SSH command execution on monitor hosts.
 *
 * Uses native ssh2 library for non-interactive commands.
 */

import { Client } from 'ssh2';
import { readFileSync } from 'fs';
import type { Config } from '../config.js';

export type SshSettings = Pick<Config, 'sshUser' | 'sshKeyPath' | 'sshPort' | 'commandTimeoutSeconds'>;

export interface ExecResult {
  stdout: string;
  stderr: string;
  code: number;
}

export async function sshExec(
  host: string,
  command: string,
  config: SshSettings,
  timeoutMs = config.commandTimeoutSeconds * 1000,
): Promise<ExecResult> {
  const privateKey = readFileSync(config.sshKeyPath);

  return new Promise((resolve, reject) => {
    const conn = new Client();
    const timer = setTimeout(() => {
      conn.end();
      reject(new Error(`SSH to ${host} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    conn
      .on('ready', () => {
        conn.exec(command, (err, stream) => {
          if (err) {
            clearTimeout(timer);
            conn.end();
            return reject(err);
          }

          let stdout = '';
          let stderr = '';

          stream.on('data', (data: Buffer) => { stdout += data.toString(); });
          stream.stderr.on('data', (data: Buffer) => { stderr += data.toString(); });

          stream.on('close', (code: number | null) => {
            clearTimeout(timer);
            conn.end();
            resolve({ stdout: stdout.trim(), stderr: stderr.trim(), code: code ?? -1 });
          });
        });
      })
      .on('error', (err) => {
        clearTimeout(timer);
        reject(new Error(`SSH to ${host}: ${err.message}`));
      })
      .connect({
        host,
        port: config.sshPort,
        username: config.sshUser,
        privateKey,
        readyTimeout: timeoutMs,
      });
  });
}
