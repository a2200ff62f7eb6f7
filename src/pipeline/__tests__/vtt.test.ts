import { describe, expect, it } from "vitest";
import { parseVtt } from "../vtt.js";

const SAMPLE = [
  "WEBVTT",
  "Kind: captions",
  "Language: en",
  "",
  "00:00:00.000 --> 00:00:02.000 align:start position:0%",
  "hello<00:00:00.500><c> world</c>",
  "",
  "00:00:02.000 --> 00:00:04.000",
  "hello world",
  "this&nbsp;is new",
  "",
  "1",
  "00:00:04.000 --> 00:00:05.000",
  "done",
].join("\n");

describe("parseVtt", () => {
  it("keeps caption text once, in order, without timing or markup", () => {
    expect(parseVtt(SAMPLE)).toBe("hello world this is new done");
  });

  it("accepts CRLF line endings", () => {
    expect(parseVtt(SAMPLE.replace(/\n/g, "\r\n"))).toBe("hello world this is new done");
  });

  it("returns an empty string when there is no caption text", () => {
    expect(parseVtt("WEBVTT\n\n00:00:00.000 --> 00:00:01.000\n\n")).toBe("");
  });
});
