/**
 * Splunkbase catalog client: login, release lookup and package download.
 * Holds the session cookies for the lifetime of one run.
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { AuthenticationError, errorMessage } from '../errors.js';
import type { Cookies, HttpClient } from '../http/client.js';
import type { Logger } from '../logger.js';

export const BASE_URL = 'https://splunkbase.splunk.com';
export const LOGIN_URL = `${BASE_URL}/api/account:login/`;

export function versionUrl(uid: string): string {
  return `${BASE_URL}/api/v1/app/${encodeURIComponent(uid)}/release/`;
}

export function downloadUrl(appId: string, version: string): string {
  return `https://api.splunkbase.splunk.com/api/v2/apps/${encodeURIComponent(appId)}/releases/${encodeURIComponent(version)}/download/?origin=sb&lead=false`;
}

export function packageFileName(name: string, uid: string, version: string): string {
  return `${name}_${uid}_${version}.tgz`;
}

// Releases are listed newest first
const ReleaseListSchema = z.array(z.object({ name: z.string() }));

export interface Credentials {
  username?: string;
  password?: string;
}

/**
 * What the reconciler needs from a catalog
 */
export interface CatalogClient {
  isAuthenticated(): boolean;
  getLatestVersion(uid: string): Promise<string | undefined>;
  downloadPackage(name: string, uid: string, version: string): Promise<string | undefined>;
}

export interface SplunkbaseClientOptions {
  http: HttpClient;
  credentials: Credentials;
  outputDir: string;
  logger: Logger;
  now?: () => Date;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
}

export class SplunkbaseClient implements CatalogClient {
  private readonly http: HttpClient;
  private readonly credentials: Credentials;
  private readonly outputDir: string;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private cookies: Cookies | null = null;

  constructor(options: SplunkbaseClientOptions) {
    this.http = options.http;
    this.credentials = options.credentials;
    this.outputDir = options.outputDir;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  isAuthenticated(): boolean {
    return this.cookies !== null;
  }

  async authenticate(): Promise<void> {
    this.logger.debug('Authenticating with Splunkbase...');
    try {
      const response = await this.http.post(LOGIN_URL, {
        form: {
          username: this.credentials.username,
          password: this.credentials.password,
        },
      });

      if (response.status !== 200) {
        throw new AuthenticationError(`Authentication failed with status code: ${response.status}`, {
          statusCode: response.status,
        });
      }
      if (Object.keys(response.cookies).length === 0) {
        throw new AuthenticationError('Authentication failed: no session cookies returned', {
          statusCode: response.status,
        });
      }

      this.cookies = response.cookies;
      this.logger.debug('Authentication successful');
    } catch (err) {
      this.logger.error(`Authentication error: ${errorMessage(err)}`);
      throw err;
    }
  }

  async getLatestVersion(uid: string): Promise<string | undefined> {
    const cookies = this.requireSession();
    if (!cookies) return undefined;

    try {
      const response = await this.http.get(versionUrl(uid), { cookies });
      if (response.status !== 200) {
        this.logger.error(`Error retrieving app version for ${uid}: Status code ${response.status}`);
        return undefined;
      }

      const releases = ReleaseListSchema.parse(response.json());
      if (releases.length === 0) {
        this.logger.warn(`No versions found for app ${uid}`);
        return undefined;
      }
      return releases[0].name;
    } catch (err) {
      this.logger.error(`Error getting latest version for ${uid}: ${errorMessage(err)}`);
      return undefined;
    }
  }

  /**
   * Download a release unless its archive is already in the output directory.
   * Returns the update timestamp on success.
   */
  async downloadPackage(name: string, uid: string, version: string): Promise<string | undefined> {
    const cookies = this.requireSession();
    if (!cookies) return undefined;

    const fileName = packageFileName(name, uid, version);
    const path = join(this.outputDir, fileName);

    try {
      await fs.mkdir(this.outputDir, { recursive: true });

      if (await fileExists(path)) {
        this.logger.info(`Skipping download of ${fileName} (already exists)`);
        return undefined;
      }

      this.logger.info(`Downloading ${path}...`);
      const response = await this.http.get(downloadUrl(uid, version), { cookies });
      if (response.status !== 200) {
        this.logger.error(`Failed to download ${path}. Status code: ${response.status}`);
        return undefined;
      }

      await fs.writeFile(path, response.body);
      this.logger.info(`Successfully downloaded ${path}`);
      return response.headers['last-modified'] || this.now().toISOString();
    } catch (err) {
      this.logger.error(`Error downloading ${uid} v${version}: ${errorMessage(err)}`);
      return undefined;
    }
  }

  private requireSession(): Cookies | null {
    if (!this.cookies) {
      this.logger.error('Not authenticated. Call authenticate() first.');
    }
    return this.cookies;
  }
}
