/**
 * Amazon CloudFront provider
 *
 * Posts the InvalidationBatch XML to the CloudFront REST API, signed with
 * AWS Signature V4. The request body is built by hand (see
 * domain/payload-builders/cloudfront.ts) so the document sent is exactly the
 * one the builder produced; only signing comes from the AWS libraries.
 */

import { Sha256 } from "@aws-crypto/sha256-js";
import { HttpRequest } from "@smithy/protocol-http";
import { SignatureV4 } from "@smithy/signature-v4";
import { XMLParser } from "fast-xml-parser";
import type { CdnProvider } from "./types.js";
import { runProviderCall } from "./result.js";
import {
  buildCloudFrontInvalidationXml,
  cloudFrontInvalidationUrl,
  type CloudFrontConfig,
} from "../domain/payload-builders/index.js";
import { batchCallerReference } from "../domain/utils/caller-reference.js";
import { SystemTimeProvider, type TimeProvider } from "../domain/utils/time.js";
import { CLOUDFRONT_MAX_PATHS } from "../domain/batching/split.js";
import { PURGE_ALL_PATH } from "../domain/paths/validate.js";
import { classifyHttpStatus, isRecord, truncate, type ProviderHttpClient } from "../http/provider-http.js";
import { ProviderError, RateLimitError } from "../errors.js";
import type { InvalidationBatch, InvalidationResult } from "../types/domain.js";

// Error codes CloudFront returns with 400 that clear up on their own
const THROTTLING_CODES = new Set(["TooManyInvalidationsInProgress", "Throttling"]);

const xmlParser = new XMLParser({ parseTagValue: false, ignoreAttributes: true });

export interface CloudFrontProviderDeps {
  http: ProviderHttpClient;
  time?: TimeProvider;
}

interface CloudFrontErrorInfo {
  code?: string;
  message?: string;
}

function textOf(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/**
 * Invalidation id from a 201 response: <Invalidation><Id>...</Id>...</Invalidation>
 */
export function parseInvalidationId(xml: string): string | undefined {
  const doc: unknown = xmlParser.parse(xml);
  if (!isRecord(doc)) return undefined;
  const invalidation = doc.Invalidation;
  return isRecord(invalidation) ? textOf(invalidation.Id) : undefined;
}

/**
 * <ErrorResponse><Error><Code/><Message/></Error></ErrorResponse>
 */
export function parseCloudFrontError(xml: string): CloudFrontErrorInfo {
  let doc: unknown;
  try {
    doc = xmlParser.parse(xml);
  } catch {
    // Not XML (e.g. a proxy error page); the caller falls back to the raw text
    return {};
  }
  if (!isRecord(doc)) return {};
  const response = doc.ErrorResponse;
  if (!isRecord(response)) return {};
  const error = response.Error;
  if (!isRecord(error)) return {};
  return { code: textOf(error.Code), message: textOf(error.Message) };
}

export class CloudFrontProvider implements CdnProvider {
  readonly name = "cloudfront";
  readonly providerType = "cloudfront" as const;
  readonly maxBatchSize = CLOUDFRONT_MAX_PATHS;
  readonly target: string;

  private readonly signer: SignatureV4;
  private readonly http: ProviderHttpClient;
  private readonly time: TimeProvider;

  constructor(
    private readonly settings: Readonly<CloudFrontConfig>,
    deps: CloudFrontProviderDeps
  ) {
    this.target = settings.distributionId;
    this.http = deps.http;
    this.time = deps.time ?? new SystemTimeProvider();
    this.signer = new SignatureV4({
      service: "cloudfront",
      region: settings.region,
      credentials: {
        accessKeyId: settings.accessKeyId,
        secretAccessKey: settings.secretAccessKey,
      },
      sha256: Sha256,
    });
  }

  async submit(batch: InvalidationBatch, callerReference: string): Promise<InvalidationResult> {
    return runProviderCall(this.name, batch, () =>
      this.createInvalidation(batch.paths, batchCallerReference(callerReference, batch.sequenceIndex))
    );
  }

  async purgeAll(batch: InvalidationBatch, callerReference: string): Promise<InvalidationResult> {
    return runProviderCall(this.name, batch, () =>
      this.createInvalidation([PURGE_ALL_PATH], batchCallerReference(callerReference, batch.sequenceIndex))
    );
  }

  /**
   * Build the signed request. Exposed for tests, which check the signature
   * headers for a fixed clock.
   */
  async signedRequest(
    paths: readonly string[],
    callerReference: string
  ): Promise<{ url: string; headers: Record<string, string>; body: string }> {
    const url = new URL(cloudFrontInvalidationUrl(this.settings.distributionId));
    const body = buildCloudFrontInvalidationXml(paths, callerReference);

    const request = new HttpRequest({
      method: "POST",
      protocol: url.protocol,
      hostname: url.hostname,
      path: url.pathname,
      headers: {
        host: url.hostname,
        "content-type": "text/xml",
      },
      body,
    });

    const signed = await this.signer.sign(request, { signingDate: new Date(this.time.now()) });

    // fetch derives Host from the URL itself
    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(signed.headers)) {
      if (name.toLowerCase() !== "host") headers[name] = value;
    }

    return { url: url.toString(), headers, body };
  }

  private async createInvalidation(paths: readonly string[], callerReference: string): Promise<string> {
    const { url, headers, body } = await this.signedRequest(paths, callerReference);
    const response = await this.http.send({ method: "POST", url, headers, body });

    if (!response.ok) {
      const { code, message } = parseCloudFrontError(response.text);
      const detail = [code, message ?? truncate(response.text)].filter(Boolean).join(": ");

      if (code && THROTTLING_CODES.has(code)) {
        throw new RateLimitError(`HTTP ${response.status}: ${detail}`);
      }
      const classified = classifyHttpStatus(
        response.status,
        detail,
        response.headers.get("retry-after"),
        new Date(this.time.now())
      );
      if (classified instanceof ProviderError) {
        throw new ProviderError(classified.message, response.status, code);
      }
      if (classified) throw classified;
    }

    const id = parseInvalidationId(response.text);
    if (!id) {
      throw new ProviderError("CloudFront response did not contain an invalidation Id", response.status);
    }
    return id;
  }
}
