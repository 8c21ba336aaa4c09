import { InvalidPostUrlError } from "../core/errors";
import { PostRef } from "../types";

/** Accepts `https://host/{service}/user/{creatorId}/post/{postId}` with optional trailing parts. */
export function parsePostUrl(rawUrl: string): PostRef {
  let url: URL;
  try {
    url = new URL(rawUrl);
  } catch {
    throw new InvalidPostUrlError(rawUrl, "not an absolute URL");
  }

  const segments = url.pathname.split("/").filter((segment) => segment !== "");
  const [service, userMarker, creatorId, postMarker, postId] = segments;
  if (!service || userMarker !== "user" || !creatorId || postMarker !== "post" || !postId) {
    throw new InvalidPostUrlError(rawUrl, "expected /{service}/user/{creatorId}/post/{postId}");
  }

  try {
    return {
      service: decodeURIComponent(service),
      creatorId: decodeURIComponent(creatorId),
      postId: decodeURIComponent(postId),
    };
  } catch {
    throw new InvalidPostUrlError(rawUrl, "malformed percent-encoding");
  }
}

export function formatPostRef(ref: PostRef): string {
  return `${ref.service}/${ref.creatorId}/${ref.postId}`;
}
