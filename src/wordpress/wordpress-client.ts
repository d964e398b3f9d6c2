import { z } from "zod";
import type { RenderedPost } from "../content";
import { WordPressAuthError, WordPressRequestError } from "./errors";

// ============================================================================
// TYPES
// ============================================================================

export interface WordPressClientOptions {
  baseUrl: string;
  username: string;
  appPassword: string;
  /** Log the post instead of sending it. */
  dryRun: boolean;
}

export interface PublishFailure {
  kind: "unauthorized" | "http" | "network" | "invalid_response" | "dry_run";
  message: string;
  status?: number;
  body?: string;
}

export type PublishResult =
  | { ok: true; postId: number }
  | { ok: false; failure: PublishFailure };

export interface PostPublisher {
  createPost(post: RenderedPost): Promise<PublishResult>;
}

// WordPress answers with the whole post object; only the id matters here.
const createdPostSchema = z.object({
  id: z.union([
    z.number().int(),
    z.string().regex(/^\d+$/).transform((value) => Number(value)),
  ]),
});

// ============================================================================
// AUTH
// ============================================================================

/**
 * Application-password auth: one Basic token reused for every request.
 */
export function buildAuthHeaders(username: string, password: string): Record<string, string> {
  const token = Buffer.from(`${username}:${password}`).toString("base64");
  return {
    Authorization: `Basic ${token}`,
    "Content-Type": "application/json",
  };
}

// ============================================================================
// CLIENT
// ============================================================================

export class WordPressClient implements PostPublisher {
  private readonly apiBase: string;
  private readonly headers: Record<string, string>;

  constructor(private readonly options: WordPressClientOptions) {
    this.apiBase = `${options.baseUrl.replace(/\/+$/, "")}/wp-json/wp/v2`;
    this.headers = buildAuthHeaders(options.username, options.appPassword);
  }

  /**
   * Calls users/me. Throws when the credentials are rejected or the site
   * cannot be reached; nothing should be published after that.
   */
  async verifyCredentials(): Promise<void> {
    let response: Response;

    try {
      response = await fetch(`${this.apiBase}/users/me`, { headers: this.headers });
    } catch (error) {
      console.error(`❌ [WordPress] Error verifying authentication: ${describeError(error)}`);
      throw error;
    }

    if (response.status === 401) {
      const body = await readBody(response);
      console.error("❌ [WordPress] Authentication failed. Please check your credentials.");
      console.error(`[WordPress] Response: ${body}`);
      throw new WordPressAuthError(body);
    }

    if (!response.ok) {
      const body = await readBody(response);
      console.error(`❌ [WordPress] Error verifying authentication: HTTP ${response.status}`);
      console.error(`[WordPress] Response: ${body}`);
      throw new WordPressRequestError(response.status, body);
    }

    console.log("✅ [WordPress] Authentication successful");
  }

  /**
   * Creates a post. Never throws; every failure is returned and logged.
   */
  async createPost(post: RenderedPost): Promise<PublishResult> {
    const payload = {
      title: post.title,
      content: post.content,
      status: post.status,
    };

    if (this.options.dryRun) {
      console.log(`[WordPress] Dry run, not posting "${post.title}":`);
      console.log(JSON.stringify(payload, null, 2));
      return { ok: false, failure: { kind: "dry_run", message: "Dry run" } };
    }

    let response: Response;

    try {
      response = await fetch(`${this.apiBase}/posts`, {
        method: "POST",
        headers: this.headers,
        body: JSON.stringify(payload),
      });
    } catch (error) {
      const message = describeError(error);
      console.error(`❌ [WordPress] Error creating post: ${message}`);
      return { ok: false, failure: { kind: "network", message } };
    }

    if (response.status === 401) {
      const body = await readBody(response);
      console.error("❌ [WordPress] Authentication failed when creating post.");
      console.error(`[WordPress] Response: ${body}`);
      return {
        ok: false,
        failure: { kind: "unauthorized", message: "Authentication failed", status: 401, body },
      };
    }

    if (!response.ok) {
      const body = await readBody(response);
      const message = `HTTP ${response.status}: ${response.statusText}`;
      console.error(`❌ [WordPress] Error creating post: ${message}`);
      console.error(`[WordPress] Response: ${body}`);
      return {
        ok: false,
        failure: { kind: "http", message, status: response.status, body },
      };
    }

    const body = await readBody(response);
    const parsed = createdPostSchema.safeParse(parseJson(body));

    if (!parsed.success) {
      console.error("❌ [WordPress] Post created but the response has no usable id");
      console.error(`[WordPress] Response: ${body}`);
      return {
        ok: false,
        failure: {
          kind: "invalid_response",
          message: "Response is missing an integer id",
          status: response.status,
          body,
        },
      };
    }

    return { ok: true, postId: parsed.data.id };
  }
}

// ============================================================================
// HELPERS
// ============================================================================

async function readBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    return `<unreadable body: ${describeError(error)}>`;
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
