export class WordPressRequestError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
    message: string = `WordPress request failed with HTTP ${status}`
  ) {
    super(message);
    this.name = "WordPressRequestError";
  }
}

export class WordPressAuthError extends WordPressRequestError {
  constructor(body: string) {
    super(401, body, "Authentication failed");
    this.name = "WordPressAuthError";
  }
}
