import fs from 'fs/promises';
import path from 'path';
import { HttpProbe } from './http';

/**
 * Where uploaded metadata files and certificates live. `objectStorage` tells
 * consumers that files are only reachable by URL.
 */
export interface FileStorage {
  readonly objectStorage: boolean;
  pathOf(ref: string): string;
  urlOf(ref: string): string;
  read(ref: string): Promise<string>;
}

function joinUrl(base: string, ref: string): string {
  return `${base.replace(/\/+$/, '')}/${ref.replace(/^\/+/, '')}`;
}

export class LocalFileStorage implements FileStorage {
  readonly objectStorage = false;

  constructor(
    private readonly root: string,
    private readonly baseUrl: string
  ) {}

  pathOf(ref: string): string {
    return path.resolve(this.root, ref);
  }

  urlOf(ref: string): string {
    return joinUrl(this.baseUrl, ref);
  }

  read(ref: string): Promise<string> {
    return fs.readFile(this.pathOf(ref), 'utf8');
  }
}

export class ObjectFileStorage implements FileStorage {
  readonly objectStorage = true;

  constructor(
    private readonly baseUrl: string,
    private readonly http: HttpProbe
  ) {}

  pathOf(ref: string): string {
    return ref;
  }

  urlOf(ref: string): string {
    return joinUrl(this.baseUrl, ref);
  }

  async read(ref: string): Promise<string> {
    const res = await this.http.get(this.urlOf(ref));
    if (res.status !== 200) {
      throw new Error(`object ${ref} answered with HTTP ${res.status}`);
    }
    return res.body;
  }
}
