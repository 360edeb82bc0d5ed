import { ApiResponseError, TwitterApi } from "twitter-api-v2";
import type { Logger, PublishRequest, PublishResult, Publisher } from "./types.js";
import { postLength } from "./budget.js";

export interface TwitterCredentials {
  apiKey: string;
  apiSecret: string;
  accessToken: string;
  accessTokenSecret: string;
}

/** The two calls a post needs: a v1.1 media upload and a v2 tweet. */
export interface PostingClient {
  uploadMedia(filePath: string): Promise<string>;
  createPost(text: string, mediaId: string): Promise<{ id: string }>;
}

export function createTwitterClient(credentials: TwitterCredentials): PostingClient {
  const client = new TwitterApi({
    appKey: credentials.apiKey,
    appSecret: credentials.apiSecret,
    accessToken: credentials.accessToken,
    accessSecret: credentials.accessTokenSecret,
  });

  return {
    uploadMedia: (filePath) => client.v1.uploadMedia(filePath),
    createPost: async (text, mediaId) => {
      const result = await client.v2.tweet(text, { media: { media_ids: [mediaId] } });
      return { id: result.data.id };
    },
  };
}

export function isRateLimitError(error: unknown): boolean {
  if (error instanceof ApiResponseError) {
    return error.rateLimitError;
  }
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    (error.code === 429 || error.code === 420)
  );
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class TwitterPublisher implements Publisher {
  constructor(
    private readonly client: PostingClient,
    private readonly logger: Logger = console
  ) {}

  async publish(request: PublishRequest): Promise<PublishResult> {
    if (request.text.trim().length === 0 || request.image.bytes.length === 0) {
      this.logger.error("Post prerequisites not met (empty text or image). Aborting.");
      return {
        ok: false,
        reason: "precondition_not_met",
        message: "Post text and image are required",
      };
    }

    try {
      const mediaId = await this.client.uploadMedia(request.image.path);
      const post = await this.client.createPost(request.text, mediaId);
      this.logger.log("Posted weather update to X/Twitter with image");
      this.logger.log(`Final post (${postLength(request.text)} chars):\n${request.text}`);
      return { ok: true, postId: post.id };
    } catch (error) {
      if (isRateLimitError(error)) {
        this.logger.warn("Rate limit exceeded. Will not retry.");
        return { ok: false, reason: "rate_limited", message: describeError(error) };
      }
      this.logger.error("Error posting to X/Twitter", error);
      return { ok: false, reason: "transport_error", message: describeError(error) };
    }
  }
}
