/**
 * release.ts
 *
 * Looks up a published release and its downloadable assets on the GitHub
 * releases API.
 */

import { z } from 'zod';
import { GITHUB_API_URL, USER_AGENT, log, runCommand, type CommandRunner } from './common';
import { InstallError } from './errors';
import type { Headers, HttpClient } from './http';

const zAsset = z.object({
  name: z.string(),
  url: z.string().url(),
});

const zRelease = z.object({
  tag_name: z.string(),
  assets: z.array(zAsset),
});

export interface AssetDescriptor {
  readonly name: string;
  /** API address of the asset; fetched with an octet-stream Accept header. */
  readonly downloadRef: string;
}

export interface ReleaseDescriptor {
  readonly tag: string;
  /** Index order, as returned by the release API. */
  readonly assets: readonly AssetDescriptor[];
}

export function releaseUrl(repository: string, version: string, apiUrl = GITHUB_API_URL): string {
  if (version === 'latest') {
    return `${apiUrl}/repos/${repository}/releases/latest`;
  }
  return `${apiUrl}/repos/${repository}/releases/tags/${encodeURIComponent(version)}`;
}

const getGithubHeaders = (token: string | undefined, accept: string): Headers => {
  const headers: Headers = {
    Accept: accept,
    'X-GitHub-Api-Version': '2022-11-28',
    'User-Agent': USER_AGENT,
  };

  if (token) {
    headers['Authorization'] = `Bearer ${token}`;
  }

  return headers;
};

export const metadataHeaders = (token?: string): Headers =>
  getGithubHeaders(token, 'application/vnd.github+json');

export const assetHeaders = (token?: string): Headers =>
  getGithubHeaders(token, 'application/octet-stream');

/**
 * Returns the configured token, else whatever the GitHub CLI reports.
 * No credential is not an error: public releases need none.
 */
export function resolveCredential(token: string | undefined, runner: CommandRunner = runCommand): string | undefined {
  if (token) {
    return token;
  }

  const output = runner('gh auth token', { silent: true, allowFailure: true });
  const helperToken = output?.trim();
  if (helperToken) {
    log('Using credential from gh auth token', 'dim');
    return helperToken;
  }
  return undefined;
}

export async function resolveRelease(
  http: HttpClient,
  repository: string,
  version: string,
  token?: string,
): Promise<ReleaseDescriptor> {
  const url = releaseUrl(repository, version);
  log(`Fetching release information (${version})...`, 'yellow');

  let body: unknown;
  try {
    body = await http.getJson(url, metadataHeaders(token));
  } catch (error) {
    throw new InstallError('ReleaseLookupFailed', `Could not fetch release metadata from ${url}`, { cause: error });
  }

  const parsed = zRelease.safeParse(body);
  if (!parsed.success) {
    throw new InstallError('ReleaseLookupFailed', `Unexpected release metadata from ${url}`, {
      cause: parsed.error,
    });
  }

  log(`Release: ${parsed.data.tag_name}`, 'green');
  return {
    tag: parsed.data.tag_name,
    assets: parsed.data.assets.map((asset) => ({ name: asset.name, downloadRef: asset.url })),
  };
}
