/**
 * GnuPG signing backend.
 *
 * Shells out to `gpg` for detached ASCII-armored signatures. Payload and
 * signature go through a private temp directory that is removed after every
 * call. Every invocation is bounded by `timeoutMs`.
 *
 * Verification status comes from `--status-fd 1`:
 *   [GNUPG:] GOODSIG <keyid> <user id>
 *   [GNUPG:] VALIDSIG <fingerprint> <date> <timestamp> ...
 */

import { execFile } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { normalizeFingerprint } from './fingerprint';
import { SigningBackend, VerificationOutcome } from './types';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  file: string,
  args: string[],
  options: { input?: string; timeoutMs: number },
) => Promise<CommandResult>;

/** Runs a command; rejects on spawn failure or timeout, resolves on any exit code. */
export const execFileRunner: CommandRunner = (file, args, { input, timeoutMs }) =>
  new Promise((resolve, reject) => {
    const child = execFile(
      file,
      args,
      { encoding: 'utf-8', timeout: timeoutMs, maxBuffer: 10 * 1024 * 1024 },
      (err, stdout, stderr) => {
        if (err && (err.killed || typeof err.code !== 'number')) {
          reject(err);
          return;
        }
        resolve({ exitCode: err && typeof err.code === 'number' ? err.code : 0, stdout, stderr });
      },
    );
    if (input !== undefined) {
      child.stdin?.end(input);
    }
  });

export interface GpgStatus {
  valid: boolean;
  fingerprint?: string;
  signer?: string;
  signedAt?: string;
}

export function parseGpgStatus(statusOutput: string): GpgStatus {
  const status: GpgStatus = { valid: false };

  for (const line of statusOutput.split('\n')) {
    if (line.includes('[GNUPG:] VALIDSIG')) {
      const parts = line.trim().split(/\s+/);
      if (parts.length >= 3) {
        status.fingerprint = parts[2];
        status.valid = true;
      }
      if (parts.length >= 5 && /^\d+$/.test(parts[4])) {
        status.signedAt = new Date(parseInt(parts[4], 10) * 1000).toISOString();
      }
    } else if (line.includes('[GNUPG:] GOODSIG')) {
      const parts = line.trim().split(' ');
      if (parts.length >= 4) {
        status.signer = parts.slice(3).join(' ');
      }
    }
  }

  return status;
}

export interface GpgBackendOptions {
  binary?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
}

const ARMORED_PUBLIC_KEY = '-----BEGIN PGP PUBLIC KEY BLOCK-----';

export class GpgBackend implements SigningBackend {
  readonly name = 'gpg';
  private binary: string;
  private timeoutMs: number;
  private runner: CommandRunner;

  constructor(options: GpgBackendOptions = {}) {
    this.binary = options.binary ?? 'gpg';
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.runner = options.runner ?? execFileRunner;
  }

  async sign(payload: Uint8Array, keyRef: string): Promise<string> {
    return this.withTempDir(async dir => {
      const dataFile = path.join(dir, 'data.json');
      const sigFile = path.join(dir, 'data.asc');
      await fs.promises.writeFile(dataFile, payload);

      const result = await this.gpg([
        '--detach-sign', '--armor',
        '--output', sigFile,
        '--local-user', keyRef,
        dataFile,
      ]);
      if (result.exitCode !== 0) {
        throw new Error(`Signing failed: ${result.stderr.trim()}`);
      }

      const signature = await fs.promises.readFile(sigFile, 'utf-8');
      if (!signature.trim()) {
        throw new Error('Signing produced an empty signature');
      }
      return signature;
    });
  }

  /**
   * Verify a detached signature. `identity` is either an armored public key
   * (imported first) or the expected signer fingerprint.
   */
  async verify(payload: Uint8Array, signature: string, identity: string): Promise<VerificationOutcome> {
    let expectedFingerprint: string | undefined;
    if (identity.includes(ARMORED_PUBLIC_KEY)) {
      // Already-imported keys make gpg exit non-zero; the verify below decides.
      await this.gpg(['--import'], identity);
    } else {
      expectedFingerprint = normalizeFingerprint(identity);
    }

    return this.withTempDir(async dir => {
      const dataFile = path.join(dir, 'data.json');
      const sigFile = path.join(dir, 'data.asc');
      await fs.promises.writeFile(dataFile, payload);
      await fs.promises.writeFile(sigFile, signature, 'utf-8');

      const result = await this.gpg(['--verify', '--status-fd', '1', sigFile, dataFile]);
      const status = parseGpgStatus(result.stdout);

      if (result.exitCode !== 0 || !status.valid || !status.fingerprint) {
        return { valid: false, reason: result.stderr.trim() || 'Signature verification failed' };
      }
      const signerFingerprint = normalizeFingerprint(status.fingerprint);
      if (expectedFingerprint && signerFingerprint !== expectedFingerprint) {
        return {
          valid: false,
          reason: `Fingerprint mismatch: expected ${expectedFingerprint}, got ${signerFingerprint}`,
        };
      }
      return { valid: true, signerFingerprint };
    });
  }

  async exportPublicKey(keyRef: string): Promise<string> {
    const result = await this.gpg(['--export', '--armor', keyRef]);
    if (result.exitCode !== 0) {
      throw new Error(`Key export failed: ${result.stderr.trim()}`);
    }
    if (!result.stdout.trim()) {
      throw new Error(`No public key data exported for ${keyRef}`);
    }
    return result.stdout;
  }

  async fingerprintOf(keyRef: string): Promise<string> {
    const result = await this.gpg(['--with-colons', '--fingerprint', keyRef]);
    if (result.exitCode !== 0) {
      throw new Error(`Key ${keyRef} not found in GPG keyring`);
    }
    const fpr = result.stdout.split('\n').find(line => line.startsWith('fpr:'));
    const fingerprint = fpr?.split(':')[9];
    if (!fingerprint) {
      throw new Error(`No fingerprint listed for ${keyRef}`);
    }
    return normalizeFingerprint(fingerprint);
  }

  private gpg(args: string[], input?: string): Promise<CommandResult> {
    return this.runner(this.binary, ['--batch', '--yes', ...args], {
      input,
      timeoutMs: this.timeoutMs,
    });
  }

  private async withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
    const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'ledger-gpg-'));
    try {
      return await fn(dir);
    } finally {
      await fs.promises.rm(dir, { recursive: true, force: true });
    }
  }
}
