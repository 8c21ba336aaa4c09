export interface PostRef {
  service: string;
  creatorId: string;
  postId: string;
}

export interface Creator {
  readonly service: string;
  readonly id: string;
  readonly name: string;
}

export type AttachmentKind = "picture" | "file";

export interface Attachment {
  kind: AttachmentKind;
  postId: string;
  remoteServer: string;
  remotePath: string;
  localFilename: string;
  /** Owned by the parent post. */
  destinationFolder: string;
}

export interface Post {
  id: string;
  service: string;
  creatorId: string;
  title: string;
  pictures: Attachment[];
  files: Attachment[];
  creator: Creator;
  destinationFolder: string;
}

export interface DownloadTask {
  /** Submission position across the whole batch. */
  index: number;
  attachment: Attachment;
  url: string;
}

export interface DownloadSucceeded {
  status: "succeeded";
  task: DownloadTask;
  localPath: string;
  bytes: number;
}

export interface DownloadFailed {
  status: "failed";
  task: DownloadTask;
  error: string;
  errorName: string;
  attempts: number;
}

export type DownloadOutcome = DownloadSucceeded | DownloadFailed;

export interface DownloadFailure {
  index: number;
  postId: string;
  kind: AttachmentKind;
  localFilename: string;
  url: string;
  error: string;
  attempts: number;
}

export interface Summary {
  submittedCount: number;
  succeededCount: number;
  totalBytes: number;
  failures: DownloadFailure[];
}

export type PostResolution =
  | { status: "resolved"; ref: PostRef; post: Post }
  | { status: "failed"; ref: PostRef; error: string; errorName: string };

export interface PostFailure {
  ref: PostRef;
  error: string;
  errorName: string;
}

export interface RunReport {
  runId: string;
  dryRun: boolean;
  posts: {
    requested: number;
    resolved: number;
    failures: PostFailure[];
  };
  downloads: Summary;
}

export interface SubmittedTaskRecord {
  index: number;
  postId: string;
  kind: AttachmentKind;
  url: string;
  localPath: string;
  submittedAt: string;
}

export interface DownloadResultRecord {
  index: number;
  postId: string;
  kind: AttachmentKind;
  url: string;
  status: "downloaded_ok" | "download_failed";
  localPath?: string;
  bytes?: number;
  error?: string;
  attempts?: number;
  finishedAt: string;
}

export interface RunSummaryRecord {
  dryRun: boolean;
  postsRequested: number;
  postsResolved: number;
  postsFailed: number;
  submittedCount: number;
  succeededCount: number;
  failedCount: number;
  totalBytes: number;
  finishedAt: string;
}
