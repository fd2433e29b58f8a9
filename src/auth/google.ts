import { z } from 'zod';
import { requestJson, type FetchLike } from '../http.js';

export interface GoogleOAuthOptions {
  /** OAuth client id */
  clientId: string;
  /** OAuth client secret */
  clientSecret: string;
  /** Inject fetch for tests */
  fetcher?: FetchLike;
}

export interface GoogleProfile {
  /** OpenID subject: stable account id. */
  sub: string;
  email: string;
  emailVerified: boolean;
  name?: string;
}

const AUTH_URL = 'https://accounts.google.com/o/oauth2/v2/auth';
const TOKEN_URL = 'https://oauth2.googleapis.com/token';
const USERINFO_URL = 'https://openidconnect.googleapis.com/v1/userinfo';

export const GOOGLE_SCOPES = ['openid', 'email', 'profile'];

const TokenResponseSchema = z.object({
  access_token: z.string(),
  expires_in: z.number(),
  token_type: z.string(),
  id_token: z.string().optional(),
  scope: z.string().optional(),
});

export type GoogleTokenResponse = z.infer<typeof TokenResponseSchema>;

const UserInfoSchema = z.object({
  sub: z.string().min(1),
  email: z.string().email(),
  email_verified: z.union([z.boolean(), z.enum(['true', 'false'])]).optional(),
  name: z.string().optional(),
});

export class GoogleOAuthClient {
  private fetcher: FetchLike;

  constructor(private opts: GoogleOAuthOptions) {
    this.fetcher = opts.fetcher ?? fetch;
  }

  /** Consent screen URL. `state` is echoed back to the callback. */
  authorizationUrl(redirectUri: string, state: string): string {
    const authUrl = new URL(AUTH_URL);
    authUrl.searchParams.set('client_id', this.opts.clientId);
    authUrl.searchParams.set('redirect_uri', redirectUri);
    authUrl.searchParams.set('response_type', 'code');
    authUrl.searchParams.set('scope', GOOGLE_SCOPES.join(' '));
    authUrl.searchParams.set('state', state);
    authUrl.searchParams.set('prompt', 'select_account');
    return authUrl.toString();
  }

  async exchangeCode(code: string, redirectUri: string): Promise<GoogleTokenResponse> {
    const body = new URLSearchParams({
      code,
      client_id: this.opts.clientId,
      client_secret: this.opts.clientSecret,
      redirect_uri: redirectUri,
      grant_type: 'authorization_code',
    });

    const res = await this.fetcher(TOKEN_URL, {
      method: 'POST',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      body,
    });

    if (!res.ok) {
      const txt = await res.text().catch(() => '');
      throw new Error(`Google token exchange failed: HTTP ${res.status} ${txt}`);
    }

    return TokenResponseSchema.parse(await res.json());
  }

  async fetchProfile(accessToken: string): Promise<GoogleProfile> {
    const raw = await requestJson(USERINFO_URL, { headers: { authorization: `Bearer ${accessToken}` }, retries: 1 }, this.fetcher);
    const info = UserInfoSchema.parse(raw);
    return {
      sub: info.sub,
      email: info.email,
      emailVerified: info.email_verified === true || info.email_verified === 'true',
      name: info.name,
    };
  }

  /** Exchange the callback code and read the signed-in profile. */
  async signIn(code: string, redirectUri: string): Promise<GoogleProfile> {
    const token = await this.exchangeCode(code, redirectUri);
    return this.fetchProfile(token.access_token);
  }
}
