import { describe, it, expect } from "vitest";
import { XMLParser } from "fast-xml-parser";
import {
  buildCloudFrontInvalidationXml,
  cloudFrontInvalidationUrl,
  escapeXml,
} from "../../../domain/payload-builders/cloudfront.js";
import { SerializationError } from "../../../errors.js";

const parser = new XMLParser({ parseTagValue: false, ignoreAttributes: true, isArray: (name) => name === "Path" });

function parsePaths(xml: string): { quantity: string; paths: string[]; callerReference: string } {
  const doc = parser.parse(xml, true);
  const batch = doc.InvalidationBatch;
  return {
    quantity: batch.Paths.Quantity,
    paths: batch.Paths.Items.Path,
    callerReference: batch.CallerReference,
  };
}

describe("buildCloudFrontInvalidationXml", () => {
  it("should produce the InvalidationBatch document", () => {
    expect(buildCloudFrontInvalidationXml(["/a.html"], "ref-1")).toBe(
      [
        '<?xml version="1.0" encoding="UTF-8"?>',
        "<InvalidationBatch>",
        "    <Paths>",
        "        <Quantity>1</Quantity>",
        "        <Items>",
        "            <Path>/a.html</Path>",
        "        </Items>",
        "    </Paths>",
        "    <CallerReference>ref-1</CallerReference>",
        "</InvalidationBatch>",
      ].join("\n")
    );
  });

  it("should escape XML special characters so the document still parses", () => {
    const paths = ["/test<file>.html", "/test&page.html", '/test"quote".html'];
    const xml = buildCloudFrontInvalidationXml(paths, "ref-1");

    expect(xml).not.toContain("<file>");
    expect(xml).not.toContain("&page");
    expect(xml).not.toContain('"quote"');
    expect(xml).toContain("<Path>/test&lt;file&gt;.html</Path>");
    expect(xml).toContain("<Path>/test&amp;page.html</Path>");
    expect(xml).toContain("<Path>/test&quot;quote&quot;.html</Path>");

    const parsed = parsePaths(xml);
    expect(parsed.quantity).toBe("3");
    expect(parsed.paths).toEqual(paths);
  });

  it("should carry non-ASCII paths through unchanged", () => {
    const paths = ["/café/menü.html", "/日本語/ページ.html", "/emoji/😀.png"];
    const xml = buildCloudFrontInvalidationXml(paths, "ref-1");

    expect(xml).toContain("<Path>/日本語/ページ.html</Path>");
    expect(parsePaths(xml).paths).toEqual(paths);
  });

  it("should set Quantity to 3000 for a full batch", () => {
    const paths = Array.from({ length: 3000 }, (_, i) => `/p/${i}`);
    const parsed = parsePaths(buildCloudFrontInvalidationXml(paths, "ref-1"));

    expect(parsed.quantity).toBe("3000");
    expect(parsed.paths).toHaveLength(3000);
  });

  it("should escape the caller reference", () => {
    const xml = buildCloudFrontInvalidationXml(["/a"], "ref<&>");
    expect(xml).toContain("<CallerReference>ref&lt;&amp;&gt;</CallerReference>");
    expect(parsePaths(xml).callerReference).toBe("ref<&>");
  });

  describe("rejections", () => {
    it("should refuse more than 3000 paths", () => {
      const paths = Array.from({ length: 3001 }, (_, i) => `/p/${i}`);
      expect(() => buildCloudFrontInvalidationXml(paths, "ref-1")).toThrow(SerializationError);
    });

    it("should refuse an empty batch", () => {
      expect(() => buildCloudFrontInvalidationXml([], "ref-1")).toThrow(
        "CloudFront invalidation batch has no paths"
      );
    });

    it("should refuse characters XML 1.0 cannot carry", () => {
      expect(() => buildCloudFrontInvalidationXml(["/a\u0001b"], "ref-1")).toThrow(SerializationError);
      expect(() => buildCloudFrontInvalidationXml(["/a\ud800b"], "ref-1")).toThrow(SerializationError);
    });
  });
});

describe("escapeXml", () => {
  it("should escape the five special characters", () => {
    expect(escapeXml(`a&b<c>"d'`)).toBe("a&amp;b&lt;c&gt;&quot;d&apos;");
  });

  it("should escape an already escaped entity again", () => {
    expect(escapeXml("&amp;")).toBe("&amp;amp;");
  });
});

describe("cloudFrontInvalidationUrl", () => {
  it("should target the 2020-05-31 API", () => {
    expect(cloudFrontInvalidationUrl("E2EXAMPLE")).toBe(
      "https://cloudfront.amazonaws.com/2020-05-31/distribution/E2EXAMPLE/invalidation"
    );
  });
});
