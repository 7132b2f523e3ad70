import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { SinkTransientError, SinkWriteFailedError, errorMessage } from '../errors.js';

/**
 * Access-token capability handed to the Sheets client. How the token was obtained (and
 * where it is stored) is the caller's business.
 */
export interface CredentialProvider {
  isValid(): boolean;
  refresh(): Promise<void>;
  accessToken(): string;
}

export class StaticTokenCredentials implements CredentialProvider {
  constructor(private readonly token: string) {}

  isValid(): boolean {
    return this.token.trim() !== '';
  }

  async refresh(): Promise<void> {
    throw new SinkWriteFailedError('Static Google access token was rejected and cannot be refreshed');
  }

  accessToken(): string {
    return this.token;
  }
}

export const GOOGLE_TOKEN_URL = 'https://oauth2.googleapis.com/token';

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().default(3600),
});

export interface OAuthRefreshCredentialsOptions {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  tokenUrl?: string;
  http?: AxiosInstance;
  now?: () => number;
}

/**
 * Exchanges a stored OAuth refresh token for short-lived access tokens.
 */
export class OAuthRefreshCredentials implements CredentialProvider {
  private token = '';
  private expiresAt = 0;
  private readonly http: AxiosInstance;
  private readonly now: () => number;

  constructor(private readonly opts: OAuthRefreshCredentialsOptions) {
    this.http = opts.http ?? axios.create();
    this.now = opts.now ?? Date.now;
  }

  isValid(): boolean {
    // Treat the last minute before expiry as expired.
    return this.token !== '' && this.now() < this.expiresAt - 60_000;
  }

  async refresh(): Promise<void> {
    const form = new URLSearchParams({
      grant_type: 'refresh_token',
      client_id: this.opts.clientId,
      client_secret: this.opts.clientSecret,
      refresh_token: this.opts.refreshToken,
    });

    let body: unknown;
    try {
      const response = await this.http.post<unknown>(this.opts.tokenUrl ?? GOOGLE_TOKEN_URL, form.toString(), {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      });
      body = response.data;
    } catch (err) {
      const status = axios.isAxiosError(err) ? err.response?.status : undefined;
      if (status === undefined || status === 429 || status >= 500) {
        throw new SinkTransientError(`Google token refresh failed: ${errorMessage(err)}`, { status, cause: err });
      }
      throw new SinkWriteFailedError(`Google refresh token rejected (HTTP ${status})`, { status, cause: err });
    }

    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SinkWriteFailedError('Google token endpoint returned no access token');
    }
    this.token = parsed.data.access_token;
    this.expiresAt = this.now() + parsed.data.expires_in * 1000;
  }

  accessToken(): string {
    return this.token;
  }
}
