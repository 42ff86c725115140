import * as fs from 'fs';
import * as path from 'path';
import { IdentitySignedEntry, RegistrationEntry } from '../../chain/types';
import { isRegistrationEntry } from '../../chain/validate';
import { IRegistrationStore } from '../interfaces';
import { readJson, writeJsonAtomic } from './atomicFile';

const SAFE_KEY = /^[A-Za-z0-9_-]{1,128}$/;

/**
 * One registration record per fingerprint:
 *   <dataDir>/registrations/reg_<fingerprint>.json
 */
export class FileRegistrationStore implements IRegistrationStore {
  private registrationsDir: string;

  constructor(dataDir: string) {
    this.registrationsDir = path.join(dataDir, 'registrations');
    fs.mkdirSync(this.registrationsDir, { recursive: true });
  }

  private filePath(fingerprint: string): string {
    return path.join(this.registrationsDir, `reg_${fingerprint}.json`);
  }

  private readFile(filePath: string): RegistrationEntry | undefined {
    if (!fs.existsSync(filePath)) return undefined;
    try {
      const raw = readJson(filePath);
      return isRegistrationEntry(raw) ? raw : undefined;
    } catch (err) {
      console.error(`Registrar: failed to load ${filePath}:`, err);
      return undefined;
    }
  }

  async get(fingerprint: string): Promise<RegistrationEntry | undefined> {
    if (!SAFE_KEY.test(fingerprint)) return undefined;
    return this.readFile(this.filePath(fingerprint));
  }

  async put(entry: IdentitySignedEntry): Promise<void> {
    if (!SAFE_KEY.test(entry.identity_fingerprint)) {
      throw new Error(`Unsafe fingerprint for a file name: ${entry.identity_fingerprint}`);
    }
    writeJsonAtomic(this.filePath(entry.identity_fingerprint), entry);
  }

  async list(): Promise<RegistrationEntry[]> {
    return fs.readdirSync(this.registrationsDir)
      .filter(f => f.startsWith('reg_') && f.endsWith('.json'))
      .sort()
      .map(f => this.readFile(path.join(this.registrationsDir, f)))
      .filter((e): e is RegistrationEntry => e !== undefined);
  }
}
