export { WordPressClient, buildAuthHeaders } from "./wordpress-client";
export type {
  PostPublisher,
  PublishFailure,
  PublishResult,
  WordPressClientOptions,
} from "./wordpress-client";
export { WordPressAuthError, WordPressRequestError } from "./errors";
