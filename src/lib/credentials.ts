/**
 * Git access token resolution.
 *
 * Priority:
 *   1. GIT_TOKEN environment variable
 *   2. File named by GIT_TOKEN_FILE (a mounted secret)
 */
import fs from 'node:fs';

export class CredentialError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CredentialError';
  }
}

export type TokenSource = 'env' | 'file';

export interface ResolvedToken {
  token: string;
  source: TokenSource;
}

export function resolveGitToken(env: NodeJS.ProcessEnv = process.env): ResolvedToken {
  const fromEnv = env.GIT_TOKEN?.trim();
  if (fromEnv) {
    return { token: fromEnv, source: 'env' };
  }

  const tokenFile = env.GIT_TOKEN_FILE?.trim();
  if (tokenFile) {
    let contents: string;
    try {
      contents = fs.readFileSync(tokenFile, 'utf-8');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new CredentialError(`Cannot read git token file ${tokenFile}: ${message}`);
    }
    const token = contents.trim();
    if (!token) {
      throw new CredentialError(`Git token file ${tokenFile} is empty`);
    }
    return { token, source: 'file' };
  }

  throw new CredentialError('No git token configured. Set GIT_TOKEN or GIT_TOKEN_FILE.');
}

/**
 * Returns a getter that resolves the token on first call and caches it.
 * Failures are not cached, and surface at every call.
 */
export function createTokenProvider(env: NodeJS.ProcessEnv = process.env): () => string {
  let cached: string | null = null;
  return () => {
    if (cached === null) {
      cached = resolveGitToken(env).token;
    }
    return cached;
  };
}
