/**
 * Shared drive links → direct download links, for content submitted as a
 * Google Drive or OneDrive share.
 */

import { z } from "zod";

export const DrivePlatform = z.enum(["google_drive", "one_drive"]);
export type DrivePlatform = z.infer<typeof DrivePlatform>;

export function convertDriveLink(url: string, platform: DrivePlatform): string {
  if (platform === "google_drive") {
    const match = /\/d\/([\w-]+)/.exec(url);
    if (match?.[1]) {
      return `https://drive.google.com/uc?export=download&id=${match[1]}`;
    }
    return url;
  }

  if (url.includes("download=1")) return url;
  const separator = url.includes("?") ? "&" : "?";
  return `${url}${separator}download=1`;
}

/** Submission of content hosted on a shared drive. */
export const DrivePushRequest = z.object({
  fileUrl: z.string().url(),
  platform: DrivePlatform,
  /** Content record fields; `contentUrl` is filled from the converted link. */
  content: z.record(z.string(), z.unknown()),
  destination: z.string().min(1),
  force: z.boolean().default(false),
});
export type DrivePushRequest = z.infer<typeof DrivePushRequest>;

/** Build the plain push request a drive submission stands for. */
export function toPushRequest(request: DrivePushRequest): Record<string, unknown> {
  return {
    content: {
      ...request.content,
      contentUrl: convertDriveLink(request.fileUrl, request.platform),
    },
    destination: request.destination,
    force: request.force,
  };
}
