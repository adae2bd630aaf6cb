import { describe, it, expect } from "vitest";
import {
  buildFormatSelector,
  isPreferredVideoCodec,
  rankedVideoSelectors,
} from "../src/services/business/formatSelectors.js";

describe("buildFormatSelector", () => {
  it("prefers H.264 + AAC at 720p before falling back", () => {
    expect(buildFormatSelector("720p")).toBe(
      "bestvideo[height<=720][vcodec^=avc1]+bestaudio[acodec^=mp4a]" +
        "/bestvideo[height<=720][vcodec^=avc1]+bestaudio" +
        "/best[height<=720][vcodec^=avc1]" +
        "/bestvideo[height<=720]+bestaudio" +
        "/best[height<=720]" +
        "/best"
    );
  });

  it("has no resolution-only fallbacks for best", () => {
    expect(rankedVideoSelectors("best")).toEqual([
      "bestvideo[vcodec^=avc1]+bestaudio[acodec^=mp4a]",
      "bestvideo[vcodec^=avc1]+bestaudio",
      "best[vcodec^=avc1]",
      "best",
    ]);
  });

  it("caps 480p", () => {
    expect(rankedVideoSelectors("480p")[0]).toBe(
      "bestvideo[height<=480][vcodec^=avc1]+bestaudio[acodec^=mp4a]"
    );
  });

  it("takes any audio stream for audio", () => {
    expect(buildFormatSelector("audio")).toBe("bestaudio/best");
  });
});

describe("isPreferredVideoCodec", () => {
  it.each(["avc1.64001F", "avc1", "H264", "h264"])("accepts %s", (codec) => {
    expect(isPreferredVideoCodec(codec)).toBe(true);
  });

  it.each(["vp9", "vp09.00.40.08", "av01.0.08M.08", "hevc"])("rejects %s", (codec) => {
    expect(isPreferredVideoCodec(codec)).toBe(false);
  });
});
