import path from "node:path";

// Characters rejected by at least one common filesystem, plus ASCII control codes.
const UNSAFE_CHARACTERS = /[<>:"/\\|?*\u0000-\u001f]/g;

export function sanitizePathSegment(value: string): string {
  const cleaned = value.replace(UNSAFE_CHARACTERS, "_").replace(/[. ]+$/, "").trim();
  return cleaned === "" ? "_" : cleaned;
}

// Separators and control codes only; everything else in a declared file name is kept.
const PATH_BREAKING_CHARACTERS = /[/\\\u0000-\u001f]/g;

export function sanitizeFileName(value: string): string {
  const cleaned = value.replace(PATH_BREAKING_CHARACTERS, "_");
  return cleaned === "" || cleaned === "." || cleaned === ".." ? "_" : cleaned;
}

export function buildPostFolder(downloadsDir: string, creatorName: string, title: string, postId: string): string {
  return path.join(downloadsDir, sanitizePathSegment(`[${creatorName}] ${title} (${postId})`));
}
