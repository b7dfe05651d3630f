import { describe, it, expect } from "vitest";
import {
  cleanSub,
  findTags,
  parseEpisodeNumber,
} from "../../src/anime/parser/tags.js";

describe("findTags", () => {
  it("reads the LoliHouse layout", () => {
    expect(
      findTags("[WebRip 1080p HEVC-10bit AAC][简繁内封字幕][END]")
    ).toEqual({ sub: "简繁内封字幕", resolution: "1080p", source: "WebRip" });
  });

  it("keeps the first source", () => {
    expect(findTags("[Baha][WEB-DL][1080p][AVC AAC][CHT][MP4]")).toEqual({
      sub: "CHT",
      resolution: "1080p",
      source: "Baha",
    });
  });

  it("reads parenthesised tags", () => {
    expect(findTags("(CR 1920x1080 AVC AAC MKV)")).toEqual({
      sub: undefined,
      resolution: "1920x1080",
      source: "CR",
    });
  });

  it("drops the container suffix from the subtitle tag", () => {
    expect(findTags("[GB_MP4][1920X1080]")).toEqual({
      sub: "GB",
      resolution: "1920X1080",
      source: undefined,
    });
  });

  it("recognises 4K and BDRip", () => {
    expect(findTags("[4K][BDRip]")).toEqual({
      sub: undefined,
      resolution: "4K",
      source: "BDRip",
    });
  });

  it("returns nothing for an empty block", () => {
    expect(findTags("")).toEqual({
      sub: undefined,
      resolution: undefined,
      source: undefined,
    });
  });
});

describe("cleanSub", () => {
  it("strips _MP4 and _MKV", () => {
    expect(cleanSub("简繁_MKV")).toBe("简繁");
    expect(cleanSub("GB_MP4")).toBe("GB");
    expect(cleanSub(undefined)).toBeUndefined();
  });
});

describe("parseEpisodeNumber", () => {
  it("drops leading zeros and keeps zero", () => {
    expect(parseEpisodeNumber("007")).toBe(7);
    expect(parseEpisodeNumber("0")).toBe(0);
  });

  it("returns undefined without digits", () => {
    expect(parseEpisodeNumber(undefined)).toBeUndefined();
    expect(parseEpisodeNumber("")).toBeUndefined();
    expect(parseEpisodeNumber("abc")).toBeUndefined();
  });
});
