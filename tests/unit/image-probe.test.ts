import { describe, expect, it } from "vitest";
import { fileExtension, probeImage, sniffImageFormat } from "@/lib/utils/image-probe.util";
import { heicHeader, jpegHeader, pngHeader } from "./support/images";

describe("sniffImageFormat", () => {
  it("detects JPEG, PNG and HEIC by magic bytes", () => {
    expect(sniffImageFormat(jpegHeader(10, 10))).toBe("jpeg");
    expect(sniffImageFormat(pngHeader(10, 10))).toBe("png");
    expect(sniffImageFormat(heicHeader("heic"))).toBe("heic");
    expect(sniffImageFormat(heicHeader("mif1"))).toBe("heic");
  });

  it("rejects other content", () => {
    expect(sniffImageFormat(Buffer.from("GIF89a-not-supported"))).toBeNull();
    expect(sniffImageFormat(heicHeader("isom"))).toBeNull();
    expect(sniffImageFormat(new Uint8Array())).toBeNull();
  });
});

describe("probeImage", () => {
  it("reads PNG dimensions from IHDR", () => {
    expect(probeImage(pngHeader(1024, 768))).toEqual({ format: "png", width: 1024, height: 768 });
  });

  it("reads JPEG dimensions from the SOF marker", () => {
    expect(probeImage(jpegHeader(4032, 3024))).toEqual({ format: "jpeg", width: 4032, height: 3024 });
  });

  it("leaves HEIC dimensions unknown", () => {
    expect(probeImage(heicHeader())).toEqual({ format: "heic" });
  });

  it("returns null for unsupported bytes", () => {
    expect(probeImage(Buffer.from("plain text"))).toBeNull();
  });
});

describe("fileExtension", () => {
  it("maps jpeg to jpg", () => {
    expect(fileExtension("jpeg")).toBe("jpg");
    expect(fileExtension("png")).toBe("png");
  });
});
