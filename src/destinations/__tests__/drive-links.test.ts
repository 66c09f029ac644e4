import { describe, it, expect } from "vitest";
import { convertDriveLink, DrivePushRequest, toPushRequest } from "../drive-links.js";

describe("convertDriveLink", () => {
  it("turns a Google Drive share link into a direct download link", () => {
    const url = "https://drive.google.com/file/d/1AbC-d_EF/view?usp=sharing";
    expect(convertDriveLink(url, "google_drive")).toBe(
      "https://drive.google.com/uc?export=download&id=1AbC-d_EF",
    );
  });

  it("leaves a Google Drive link without a file id unchanged", () => {
    const url = "https://drive.google.com/drive/folders";
    expect(convertDriveLink(url, "google_drive")).toBe(url);
  });

  it("appends download=1 to a OneDrive link with a query", () => {
    expect(convertDriveLink("https://onedrive.live.com/redir?resid=ABC", "one_drive")).toBe(
      "https://onedrive.live.com/redir?resid=ABC&download=1",
    );
  });

  it("starts a query on a OneDrive link without one", () => {
    expect(convertDriveLink("https://1drv.ms/w/s!abc", "one_drive")).toBe(
      "https://1drv.ms/w/s!abc?download=1",
    );
  });

  it("does not add download=1 twice", () => {
    const url = "https://onedrive.live.com/download?resid=ABC&download=1";
    expect(convertDriveLink(url, "one_drive")).toBe(url);
  });
});

describe("toPushRequest", () => {
  it("uses the converted link as the content URL", () => {
    const request = DrivePushRequest.parse({
      fileUrl: "https://drive.google.com/file/d/xyz123/view",
      platform: "google_drive",
      content: { contentId: "video-7", contentUrl: "ignored" },
      destination: "main_lrs",
    });

    expect(toPushRequest(request)).toEqual({
      content: {
        contentId: "video-7",
        contentUrl: "https://drive.google.com/uc?export=download&id=xyz123",
      },
      destination: "main_lrs",
      force: false,
    });
  });

  it("rejects an unknown platform", () => {
    const parsed = DrivePushRequest.safeParse({
      fileUrl: "https://example.com/file",
      platform: "dropbox",
      content: {},
      destination: "main_lrs",
    });
    expect(parsed.success).toBe(false);
  });
});
