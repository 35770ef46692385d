import fs from "fs";
import path from "path";
import request from "supertest";
import { app } from "../../src/app.js";
import { DOWNLOAD_DIR } from "../../src/config/env.js";
import { fetchMediaInfo, downloadFormat } from "../../src/services/external/ytdlp.js";
import { ExtractionError } from "../../src/utils/errors.js";
import type { MediaInfo } from "../../src/types/media.js";
import { putFile, resetDownloadDir } from "../helpers/library.js";

jest.mock("../../src/services/external/ytdlp.js", () => ({
  fetchMediaInfo: jest.fn(),
  downloadFormat: jest.fn(),
  getYtDlpVersion: jest.fn(),
}));

const mockedFetchMediaInfo = jest.mocked(fetchMediaInfo);
const mockedDownloadFormat = jest.mocked(downloadFormat);

const VIDEO_URL = "https://video.example/watch?v=abc123";

function sampleInfo(overrides: Partial<MediaInfo> = {}): MediaInfo {
  return {
    title: "Evening Session",
    uploader: null,
    channel: "Test Channel",
    duration: 212,
    thumbnail: "https://img.example/abc123.jpg",
    webpage_url: VIDEO_URL,
    formats: [
      { format_id: "137", ext: "mp4", acodec: "none", vcodec: "avc1.640028" },
      { format_id: "251", ext: "webm", acodec: "opus", vcodec: "none", abr: 160 },
      { format_id: "140", ext: "m4a", acodec: "mp4a.40.2", vcodec: "none", abr: 129.5 },
    ],
    ...overrides,
  };
}

beforeEach(() => {
  resetDownloadDir();
  mockedFetchMediaInfo.mockReset();
  mockedDownloadFormat.mockReset();
});

describe("POST /preview", () => {
  test("returns details and the chosen audio format", async () => {
    mockedFetchMediaInfo.mockResolvedValueOnce(sampleInfo());

    const response = await request(app).post("/preview").send({ url: `  ${VIDEO_URL}  ` });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      title: "Evening Session",
      uploader: "Test Channel",
      duration: 212,
      thumbnail: "https://img.example/abc123.jpg",
      webpage_url: VIDEO_URL,
      best_audio: { format_id: "140", ext: "m4a", abr: 129.5, acodec: "mp4a.40.2" },
    });
    expect(mockedFetchMediaInfo).toHaveBeenCalledWith(VIDEO_URL);
    expect(mockedDownloadFormat).not.toHaveBeenCalled();
  });

  test("reports nulls when no audio-only stream exists", async () => {
    mockedFetchMediaInfo.mockResolvedValueOnce(
      sampleInfo({
        uploader: "Uploader",
        webpage_url: undefined,
        formats: [{ format_id: "18", ext: "mp4", acodec: "mp4a.40.2", vcodec: "avc1" }],
      })
    );

    const response = await request(app).post("/preview").send({ url: VIDEO_URL });

    expect(response.status).toBe(200);
    expect(response.body.uploader).toBe("Uploader");
    expect(response.body.webpage_url).toBe(VIDEO_URL);
    expect(response.body.best_audio).toEqual({ format_id: null, ext: null, abr: null, acodec: null });
  });

  test("rejects a missing URL", async () => {
    const response = await request(app).post("/preview").send({});

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      error: "Validation failed",
      details: [{ path: "url", message: "URL is required" }],
    });
  });

  test("rejects a non-http URL", async () => {
    const response = await request(app).post("/preview").send({ url: "ftp://video.example/file" });

    expect(response.status).toBe(400);
    expect(response.body.details).toEqual([{ path: "url", message: "Invalid URL format" }]);
    expect(mockedFetchMediaInfo).not.toHaveBeenCalled();
  });

  test("wraps engine failures", async () => {
    mockedFetchMediaInfo.mockRejectedValueOnce(new ExtractionError("Video unavailable"));

    const response = await request(app).post("/preview").send({ url: VIDEO_URL });

    expect(response.status).toBe(500);
    expect(response.body.error).toBe("Preview failed: Video unavailable");
  });

  test("answers malformed JSON with 400", async () => {
    const response = await request(app)
      .post("/preview")
      .set("Content-Type", "application/json")
      .send("{\"url\":");

    expect(response.status).toBe(400);
  });
});

describe("POST /downloads", () => {
  test("downloads the chosen format and links to the file", async () => {
    mockedFetchMediaInfo.mockResolvedValueOnce(sampleInfo({ title: "Q&A: Part 1?" }));
    mockedDownloadFormat.mockImplementationOnce(async () => {
      putFile("Q&A_ Part 1_.m4a", "m4a-bytes");
      putFile("Q&A_ Part 1_.mhtml", "<html></html>");
    });

    const response = await request(app).post("/downloads").send({ url: VIDEO_URL });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      title: "Q&A: Part 1?",
      filename: "Q&A_ Part 1_.m4a",
      file_url: expect.stringMatching(/^http:\/\/127\.0\.0\.1:\d+\/files\/Q%26A_%20Part%201_\.m4a$/),
      status: "Downloaded",
    });
    expect(mockedDownloadFormat).toHaveBeenCalledWith(
      VIDEO_URL,
      "140",
      path.join(DOWNLOAD_DIR, "Q&A_ Part 1_.%(ext)s")
    );
    expect(fs.existsSync(path.join(DOWNLOAD_DIR, "Q&A_ Part 1_.mhtml"))).toBe(false);
  });

  test("escapes percent signs in the output template", async () => {
    mockedFetchMediaInfo.mockResolvedValueOnce(sampleInfo({ title: "100% Live" }));
    mockedDownloadFormat.mockImplementationOnce(async () => {
      putFile("100% Live.m4a");
    });

    const response = await request(app).post("/downloads").send({ url: VIDEO_URL });

    expect(response.status).toBe(200);
    expect(response.body.filename).toBe("100% Live.m4a");
    expect(mockedDownloadFormat).toHaveBeenCalledWith(VIDEO_URL, "140", path.join(DOWNLOAD_DIR, "100%% Live.%(ext)s"));
  });

  test("finds the file when the delivered extension differs", async () => {
    mockedFetchMediaInfo.mockResolvedValueOnce(
      sampleInfo({ formats: [{ format_id: "251", ext: "webm", acodec: "opus", vcodec: "none", abr: 160 }] })
    );
    mockedDownloadFormat.mockImplementationOnce(async () => {
      putFile("Evening Session.opus");
    });

    const response = await request(app).post("/downloads").send({ url: VIDEO_URL });

    expect(response.status).toBe(200);
    expect(response.body.filename).toBe("Evening Session.opus");
  });

  test("links to a file found in a subdirectory", async () => {
    mockedFetchMediaInfo.mockResolvedValueOnce(sampleInfo());
    mockedDownloadFormat.mockImplementationOnce(async () => {
      putFile("archive/Evening Session.m4a");
    });

    const response = await request(app).post("/downloads").send({ url: VIDEO_URL });

    expect(response.status).toBe(200);
    expect(response.body.filename).toBe("archive/Evening Session.m4a");
    expect(response.body.file_url).toMatch(/\/files\/archive\/Evening%20Session\.m4a$/);
  });

  test("names untitled videos 'audio'", async () => {
    mockedFetchMediaInfo.mockResolvedValueOnce(sampleInfo({ title: null }));
    mockedDownloadFormat.mockImplementationOnce(async () => {
      putFile("audio.m4a");
    });

    const response = await request(app).post("/downloads").send({ url: VIDEO_URL });

    expect(response.status).toBe(200);
    expect(response.body.title).toBe("audio");
    expect(response.body.filename).toBe("audio.m4a");
  });

  test("fails when there is no audio-only stream", async () => {
    mockedFetchMediaInfo.mockResolvedValueOnce(sampleInfo({ formats: [] }));

    const response = await request(app).post("/downloads").send({ url: VIDEO_URL });

    expect(response.status).toBe(500);
    expect(response.body.error).toBe("No audio track available (may require login/cookies).");
    expect(mockedDownloadFormat).not.toHaveBeenCalled();
  });

  test("fails when no file was produced", async () => {
    mockedFetchMediaInfo.mockResolvedValueOnce(sampleInfo());
    mockedDownloadFormat.mockResolvedValueOnce(undefined);

    const response = await request(app).post("/downloads").send({ url: VIDEO_URL });

    expect(response.status).toBe(500);
    expect(response.body.error).toBe("The audio file was not produced.");
  });

  test("wraps engine failures", async () => {
    mockedFetchMediaInfo.mockResolvedValueOnce(sampleInfo());
    mockedDownloadFormat.mockRejectedValueOnce(new ExtractionError("HTTP Error 403: Forbidden"));

    const response = await request(app).post("/downloads").send({ url: VIDEO_URL });

    expect(response.status).toBe(500);
    expect(response.body.error).toBe("Download failed: HTTP Error 403: Forbidden");
  });

  test("rejects a missing URL before calling the engine", async () => {
    const response = await request(app).post("/downloads").send({ url: "   " });

    expect(response.status).toBe(400);
    expect(response.body.details).toEqual([{ path: "url", message: "URL is required" }]);
    expect(mockedFetchMediaInfo).not.toHaveBeenCalled();
  });
});
