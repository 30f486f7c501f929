/**
 * Application-wide Constants
 *
 * Centralized location for magic numbers and configuration values.
 */

/**
 * Time durations in milliseconds
 */
export const TIME = {
  /** 1 second */
  ONE_SECOND: 1000,
  /** 5 seconds */
  FIVE_SECONDS: 5000,
  /** 30 seconds */
  THIRTY_SECONDS: 30000,
  /** 1 minute */
  ONE_MINUTE: 60000,
} as const;

/**
 * Environment variable naming
 */
export const ENV = {
  PREFIX: 'MEDIASCOPE_',
  /** Suffixes read both globally and per platform */
  CREDENTIAL_SUFFIXES: {
    proxy: 'PROXY',
    cookieSource: 'COOKIE_SOURCE',
    cookieFile: 'COOKIE_FILE',
    remoteHost: 'SSH_HOST',
  },
} as const;

/**
 * Process supervision
 */
export const PROCESS = {
  /** Grace period between SIGTERM and SIGKILL */
  KILL_GRACE_PERIOD: TIME.FIVE_SECONDS,
  /** Timeout for `--version` checks */
  VERSION_CHECK_TIMEOUT: TIME.FIVE_SECONDS,
} as const;

/**
 * Remote execution over ssh
 */
export const REMOTE = {
  /** mktemp on the remote host */
  ACQUIRE_TIMEOUT: 15 * TIME.ONE_SECOND,
  /** rm -rf of the remote temp dir */
  RELEASE_TIMEOUT: 15 * TIME.ONE_SECOND,
  /** ssh exits with 255 when the connection itself fails */
  TRANSPORT_EXIT_CODE: 255,
  /** `timeout` exits with 124 when the remote deadline passes */
  DEADLINE_EXIT_CODE: 124,
  /** SIGKILL follows the remote deadline's SIGTERM after this long */
  KILL_AFTER_SECONDS: 5,
  /** Holds the remote extractor's pid inside the temp dir */
  PID_FILE: '.mediascope.pid',
  /** Separates streamed files on stdout */
  FILE_MARKER: '__MEDIASCOPE_FILE__',
} as const;

/**
 * Output shaping
 */
export const LIMITS = {
  /** Characters of caption text kept in video info */
  SUBTITLE_SUMMARY_CHARS: 2000,
  /** Characters of description used as a summary fallback */
  DESCRIPTION_SUMMARY_CHARS: 500,
  SEARCH_MAX_RESULTS: 20,
  SEARCH_DEFAULT_RESULTS: 5,
  /** stderr characters kept in error messages */
  STDERR_EXCERPT_CHARS: 500,
} as const;
