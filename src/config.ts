// ============================================================================
// TYPES
// ============================================================================

export type PostStatus = "draft" | "publish";

export interface PublisherConfig {
  feedUrl: string;
  wordpress: {
    baseUrl: string;
    username: string;
    appPassword: string;
  };
  ledger: {
    url: string; // libsql URL, e.g. file:./rss_state.db
    authToken?: string;
  };
  tagPrefix: string;
  postStatus: PostStatus;
  dryRun: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// ============================================================================
// LOADING
// ============================================================================

type Env = Record<string, string | undefined>;

/**
 * Builds the publisher configuration from environment variables.
 * Missing variables are reported together in one ConfigError, then malformed ones.
 */
export function loadConfig(env: Env = process.env): PublisherConfig {
  const missing: string[] = [];
  const required = (name: string, value: string | undefined): string => {
    if (!value) {
      missing.push(name);
      return "";
    }
    return value;
  };

  const feedUrl = required("RSS_FEED_URL", env.RSS_FEED_URL);
  const wordpressUrl = required("WORDPRESS_URL", env.WORDPRESS_URL);
  const username = required("USERNAME (or WORDPRESS_USERNAME)", env.WORDPRESS_USERNAME || env.USERNAME);
  const appPassword = required("APP_PASSWORD", env.APP_PASSWORD);
  const tagPrefix = required("TAG_PREFIX (or PINBOARD_TAG_PREFIX)", env.TAG_PREFIX || env.PINBOARD_TAG_PREFIX);
  const dbPath = required("DB_PATH", env.DB_PATH);

  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(", ")}`);
  }

  const problems: string[] = [];
  if (!isHttpUrl(feedUrl)) problems.push(`RSS_FEED_URL is not an http(s) URL: ${feedUrl}`);
  if (!isHttpUrl(wordpressUrl)) problems.push(`WORDPRESS_URL is not an http(s) URL: ${wordpressUrl}`);

  const postStatus = env.POST_STATUS || "publish";
  if (postStatus !== "publish" && postStatus !== "draft") {
    problems.push(`POST_STATUS must be "publish" or "draft", got "${postStatus}"`);
  }

  if (problems.length > 0) {
    throw new ConfigError(problems.join("; "));
  }

  return {
    feedUrl,
    wordpress: {
      baseUrl: wordpressUrl,
      username,
      appPassword,
    },
    ledger: {
      url: toLibsqlUrl(dbPath),
      authToken: env.DB_AUTH_TOKEN || undefined,
    },
    tagPrefix,
    postStatus: postStatus === "draft" ? "draft" : "publish",
    dryRun: env.DRY_RUN === "on",
  };
}

/**
 * DB_PATH may be a plain file path or already a libsql URL (file:, libsql:, http(s):).
 */
export function toLibsqlUrl(dbPath: string): string {
  if (/^(file|libsql|https?|wss?):/.test(dbPath)) {
    return dbPath;
  }
  return `file:${dbPath}`;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}
