import type { CredentialEnvironment, CredentialSettings } from '../../config/types.js';
import type { Platform, PlatformConfig } from '../../types/media.js';

function present(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Effective extractor settings for a platform.
 *
 * Most specific wins. Cookies: platform file, platform source, global file,
 * global source. Proxy and remote host: platform, then global. A platform of
 * null (unrecognized site) sees only the global settings.
 */
export function resolvePlatformConfig(platform: Platform | null, env: CredentialEnvironment): PlatformConfig {
  const scoped: CredentialSettings = (platform && env.platforms[platform]) || {};
  const global = env.global;

  const cookieFile = present(scoped.cookieFile);
  const cookieSource = cookieFile ? null : present(scoped.cookieSource);
  const platformHasCookie = cookieFile !== null || cookieSource !== null;

  const globalCookieFile = platformHasCookie ? null : present(global.cookieFile);
  const globalCookieSource = platformHasCookie || globalCookieFile ? null : present(global.cookieSource);

  return {
    platform,
    proxy: present(scoped.proxy) ?? present(global.proxy),
    cookieFile: cookieFile ?? globalCookieFile,
    cookieSource: cookieSource ?? globalCookieSource,
    remoteHost: present(scoped.remoteHost) ?? present(global.remoteHost),
  };
}
