/**
 * CloudFront invalidation payload builder - pure function.
 *
 * Produces the InvalidationBatch XML document accepted by
 * POST /2020-05-31/distribution/{id}/invalidation.
 */

import { SerializationError } from "../../errors.js";
import { CLOUDFRONT_MAX_PATHS } from "../batching/split.js";

const XML_ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
};

// Characters XML 1.0 cannot represent, plus unpaired surrogates
const XML_INVALID =
  /[\u0000-\u0008\u000b\u000c\u000e-\u001f\ufffe\uffff]|[\ud800-\udbff](?![\udc00-\udfff])|(?<![\ud800-\udbff])[\udc00-\udfff]/;

/**
 * Escape the five XML special characters. Everything else, including
 * non-ASCII code points, passes through unchanged.
 */
export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => XML_ENTITIES[ch] ?? ch);
}

function assertEncodable(value: string, label: string): void {
  if (XML_INVALID.test(value)) {
    throw new SerializationError(`${label} contains characters XML cannot carry: ${JSON.stringify(value)}`);
  }
}

/**
 * Build the CloudFront InvalidationBatch document.
 *
 * @throws SerializationError when the batch is empty, larger than 3000 paths,
 * or a value cannot be encoded. Validated, split input never triggers this.
 */
export function buildCloudFrontInvalidationXml(
  paths: readonly string[],
  callerReference: string
): string {
  if (paths.length === 0) {
    throw new SerializationError("CloudFront invalidation batch has no paths");
  }
  if (paths.length > CLOUDFRONT_MAX_PATHS) {
    throw new SerializationError(
      `CloudFront accepts at most ${CLOUDFRONT_MAX_PATHS} paths per invalidation, got ${paths.length}`
    );
  }
  assertEncodable(callerReference, "CallerReference");

  const items = paths.map((path) => {
    assertEncodable(path, "Path");
    return `            <Path>${escapeXml(path)}</Path>`;
  });

  return [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<InvalidationBatch>`,
    `    <Paths>`,
    `        <Quantity>${items.length}</Quantity>`,
    `        <Items>`,
    ...items,
    `        </Items>`,
    `    </Paths>`,
    `    <CallerReference>${escapeXml(callerReference)}</CallerReference>`,
    `</InvalidationBatch>`,
  ].join("\n");
}

export function cloudFrontInvalidationUrl(distributionId: string): string {
  return `https://cloudfront.amazonaws.com/2020-05-31/distribution/${encodeURIComponent(distributionId)}/invalidation`;
}
