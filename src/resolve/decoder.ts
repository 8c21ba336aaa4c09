import { z } from "zod";
import { MalformedResponseError, ValidationIssue } from "../core/errors";
import { Creator } from "../types";

export const ProfileSchema = z.object({
  id: z.string(),
  name: z.string(),
  service: z.string(),
});

export const AttachmentSourceSchema = z.object({
  name: z.string(),
  path: z.string(),
  server: z.string(),
});

export const PostResponseSchema = z.object({
  post: z.object({
    id: z.string(),
    title: z.string(),
    user: z.string(),
    service: z.string(),
  }),
  previews: z.array(AttachmentSourceSchema),
  attachments: z.array(AttachmentSourceSchema),
});

export type AttachmentSource = z.infer<typeof AttachmentSourceSchema>;

/** A post response reduced to what is needed before the creator is known. */
export interface DecodedPost {
  id: string;
  title: string;
  service: string;
  creatorId: string;
  pictures: AttachmentSource[];
  files: AttachmentSource[];
}

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, what: string): T {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new MalformedResponseError(`Malformed ${what} response`, toIssues(result.error));
  }
  return result.data;
}

export function decodeCreator(payload: unknown): Creator {
  const profile = parseOrThrow(ProfileSchema, payload, "profile");
  return Object.freeze({ service: profile.service, id: profile.id, name: profile.name });
}

export function decodePost(payload: unknown): DecodedPost {
  const response = parseOrThrow(PostResponseSchema, payload, "post");
  return {
    id: response.post.id,
    title: response.post.title,
    service: response.post.service,
    creatorId: response.post.user,
    pictures: response.previews,
    files: response.attachments,
  };
}

/**
 * Previews are renamed by position: `1.jpg`, `2.png`, ... The extension is whatever
 * follows the last dot of the final path segment; a path without one yields `"3."`.
 */
export function previewFilename(index: number, remotePath: string): string {
  const segment = remotePath.slice(remotePath.lastIndexOf("/") + 1);
  const dot = segment.lastIndexOf(".");
  const extension = dot >= 0 ? segment.slice(dot + 1) : "";
  return `${index + 1}.${extension}`;
}
