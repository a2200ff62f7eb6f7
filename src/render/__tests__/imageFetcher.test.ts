import { Response, type fetch } from "undici";
import { describe, expect, it, vi } from "vitest";
import { createImageFetcher, decodeImage, loadImages, type ImageFetcher } from "../imageFetcher.js";
import { parseMarkdown } from "../markdown.js";
import { CORRUPT_RGBA_PNG, ONE_PIXEL_GIF, ONE_PIXEL_PNG } from "./images.js";

describe("createImageFetcher", () => {
  it("returns the bytes of a successful response", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response(new Uint8Array([1, 2, 3])));
    const fetchImage = createImageFetcher({ fetchImpl });
    await expect(fetchImage("https://img.test/a.png")).resolves.toEqual(Buffer.from([1, 2, 3]));
    expect(fetchImpl.mock.calls[0]?.[0]).toBe("https://img.test/a.png");
  });

  it("returns null for a non-ok status", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response("missing", { status: 404 }));
    await expect(createImageFetcher({ fetchImpl })("https://img.test/a.png")).resolves.toBeNull();
  });

  it("returns null when the request throws", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new TypeError("fetch failed");
    });
    await expect(createImageFetcher({ fetchImpl })("https://img.test/a.png")).resolves.toBeNull();
  });

  it.each(["not a url", "ftp://img.test/a.png", "data:image/png;base64,AAAA", "img/relative.png"])(
    "does not request %j",
    async (url) => {
      const fetchImpl = vi.fn<typeof fetch>();
      await expect(createImageFetcher({ fetchImpl })(url)).resolves.toBeNull();
      expect(fetchImpl).not.toHaveBeenCalled();
    }
  );

  it("gives up after the timeout", async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        })
    );
    await expect(createImageFetcher({ fetchImpl, timeoutMs: 20 })("https://img.test/slow.png")).resolves.toBeNull();
  });
});

describe("decodeImage", () => {
  it("reads PNG dimensions", () => {
    expect(decodeImage(ONE_PIXEL_PNG)).toMatchObject({ width: 1, height: 1 });
  });

  it("rejects formats the PDF writer cannot embed", () => {
    expect(decodeImage(ONE_PIXEL_GIF)).toBeNull();
  });

  it("rejects a PNG whose header reads fine but whose pixel data is corrupt", () => {
    expect(CORRUPT_RGBA_PNG.subarray(37, 41).toString("latin1")).toBe("IDAT");
    expect(decodeImage(CORRUPT_RGBA_PNG)).toBeNull();
  });

  it("rejects a JPEG cut off after its start marker", () => {
    expect(decodeImage(Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10]))).toBeNull();
  });

  it("rejects bytes that are not an image", () => {
    expect(decodeImage(Buffer.from("definitely not an image"))).toBeNull();
  });
});

describe("loadImages", () => {
  it("fetches each distinct URL once and keeps only decodable images", async () => {
    const blocks = parseMarkdown(
      "![a](https://img.test/a.png)\n\n![again](https://img.test/a.png)\n\n![b](https://img.test/b.gif)\n\n![c](https://img.test/c.png)"
    );
    const bytes: Record<string, Buffer> = {
      "https://img.test/a.png": ONE_PIXEL_PNG,
      "https://img.test/b.gif": ONE_PIXEL_GIF,
    };
    const fetchImage = vi.fn<ImageFetcher>(async (url) => bytes[url] ?? null);

    const assets = await loadImages(blocks, fetchImage);

    expect(fetchImage).toHaveBeenCalledTimes(3);
    expect([...assets.keys()]).toEqual(["https://img.test/a.png"]);
  });
});
