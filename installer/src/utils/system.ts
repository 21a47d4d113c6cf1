import { execFile } from 'child_process';
import { existsSync, readFileSync } from 'fs';

export type OSType = 'macos' | 'linux' | 'windows';

export function detectOS(): OSType {
  switch (process.platform) {
    case 'darwin': return 'macos';
    case 'win32': return 'windows';
    default: return 'linux';
  }
}

/**
 * Linux under Windows Subsystem for Linux, judged from the kernel banner
 */
export function isWSL(procVersionPath: string = '/proc/version'): boolean {
  if (!existsSync(procVersionPath)) return false;
  try {
    return /(Microsoft|WSL)/i.test(readFileSync(procVersionPath, 'utf-8'));
  } catch {
    return false;
  }
}

/**
 * Quote a value for safe use inside a bash command line
 */
export function shellQuote(value: string): string {
  if (/^[\w@%+=:,./-]+$/.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export interface ProbeResult {
  exitCode: number;
  stdout: string;
}

/**
 * Read-only command used by pre-checks (never an install)
 */
export interface ShellProbe {
  capture(command: string): Promise<ProbeResult>;
}

export function createShellProbe(env: NodeJS.ProcessEnv = process.env): ShellProbe {
  return {
    capture(command) {
      return new Promise((resolve) => {
        execFile(
          'bash',
          ['-c', command],
          { env, encoding: 'utf-8', maxBuffer: 10 * 1024 * 1024 },
          (error, stdout) => {
            if (!error) {
              resolve({ exitCode: 0, stdout });
              return;
            }
            resolve({ exitCode: typeof error.code === 'number' ? error.code : 1, stdout });
          }
        );
      });
    },
  };
}

export async function commandExists(probe: ShellProbe, command: string): Promise<boolean> {
  const result = await probe.capture(`command -v ${shellQuote(command)}`);
  return result.exitCode === 0 && result.stdout.trim() !== '';
}
