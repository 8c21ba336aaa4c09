import { mapWithConcurrency } from "../core/concurrency";
import { errorName, ExhaustedRetriesError, MetadataFetchError } from "../core/errors";
import { MetadataClient } from "../core/fetch";
import { withFailureLogging, withRetry } from "../core/retry";
import { errorMessage, Logger, MetricsRegistry } from "../observability";
import { Attachment, Creator, Post, PostRef, PostResolution } from "../types";
import { CreatorCache } from "./creatorCache";
import { AttachmentSource, decodeCreator, decodePost, previewFilename } from "./decoder";
import { buildPostFolder, sanitizeFileName } from "./folder";
import { formatPostRef } from "./postRef";

export interface ResolverOptions {
  apiBaseUrl: string;
  downloadsDir: string;
  maxAttempts: number;
  retryDelayMs?: number;
}

interface ResolverDeps {
  client: MetadataClient;
  logger: Logger;
  metrics: MetricsRegistry;
  options: ResolverOptions;
}

export class MetadataResolver {
  private readonly client: MetadataClient;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly options: ResolverOptions;
  readonly cache: CreatorCache;

  constructor(deps: ResolverDeps) {
    this.client = deps.client;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.options = deps.options;
    this.cache = new CreatorCache((service, creatorId) => this.fetchCreator(service, creatorId));
  }

  postUrl(ref: PostRef): string {
    return `${this.apiRoot()}/${encodeURIComponent(ref.service)}/user/${encodeURIComponent(ref.creatorId)}/post/${encodeURIComponent(ref.postId)}`;
  }

  profileUrl(service: string, creatorId: string): string {
    return `${this.apiRoot()}/${encodeURIComponent(service)}/user/${encodeURIComponent(creatorId)}/profile`;
  }

  async fetchPost(ref: PostRef): Promise<Post> {
    const url = this.postUrl(ref);
    this.logger.info("post_resolve_start", { postId: ref.postId, url });

    const payload = await this.fetchJson(url, "fetch_post", { postId: ref.postId });
    const decoded = decodePost(payload);
    const creator = await this.cache.resolve(decoded.service, decoded.creatorId);
    const destinationFolder = buildPostFolder(this.options.downloadsDir, creator.name, decoded.title, decoded.id);

    const toAttachment = (kind: Attachment["kind"], source: AttachmentSource, localFilename: string): Attachment => ({
      kind,
      postId: decoded.id,
      remoteServer: source.server,
      remotePath: source.path,
      localFilename,
      destinationFolder,
    });

    const post: Post = {
      id: decoded.id,
      service: decoded.service,
      creatorId: decoded.creatorId,
      title: decoded.title,
      pictures: decoded.pictures.map((source, index) =>
        toAttachment("picture", source, previewFilename(index, source.path)),
      ),
      files: decoded.files.map((source) => toAttachment("file", source, sanitizeFileName(source.name))),
      creator,
      destinationFolder,
    };

    this.logger.info("post_resolved", {
      postId: post.id,
      creator: creator.name,
      pictures: post.pictures.length,
      files: post.files.length,
      destinationFolder,
    });
    return post;
  }

  /**
   * Resolves every ref on a pool of `concurrency` workers. Failures are returned as
   * tagged results in input order and never interrupt the other refs.
   */
  async resolveAll(refs: readonly PostRef[], concurrency: number): Promise<PostResolution[]> {
    return mapWithConcurrency(refs, concurrency, async (ref): Promise<PostResolution> => {
      const resolve = withFailureLogging(() => this.fetchPost(ref), {
        logger: this.logger,
        event: "post_resolve_failed",
        fields: { postId: ref.postId, post: formatPostRef(ref) },
      });
      try {
        const post = await resolve();
        this.metrics.incrementCounter("posts_resolved", 1);
        return { status: "resolved", ref, post };
      } catch (error) {
        this.metrics.incrementCounter("posts_failed", 1);
        return { status: "failed", ref, error: errorMessage(error), errorName: errorName(error) };
      }
    });
  }

  private async fetchCreator(service: string, creatorId: string): Promise<Creator> {
    const url = this.profileUrl(service, creatorId);
    this.metrics.incrementCounter("creator_fetches", 1);
    this.logger.info("creator_fetch_start", { service, creatorId, url });
    const payload = await this.fetchJson(url, "fetch_creator", { service, creatorId });
    const creator = decodeCreator(payload);
    this.logger.info("creator_fetched", { service, creatorId, name: creator.name });
    return creator;
  }

  private async fetchJson(url: string, operationName: string, fields: Record<string, string>): Promise<unknown> {
    const stopTimer = this.metrics.startTimer("metadata_fetch_ms");
    const fetchWithRetry = withRetry(() => this.client.getJson(url), {
      operationName,
      logger: this.logger,
      maxAttempts: this.options.maxAttempts,
      retryDelayMs: this.options.retryDelayMs,
      fields: { ...fields, url },
    });

    try {
      return await fetchWithRetry();
    } catch (error) {
      if (error instanceof ExhaustedRetriesError) {
        throw new MetadataFetchError(url, error.attempts, error.lastError);
      }
      throw error;
    } finally {
      stopTimer();
    }
  }

  private apiRoot(): string {
    return this.options.apiBaseUrl.replace(/\/+$/, "");
  }
}
