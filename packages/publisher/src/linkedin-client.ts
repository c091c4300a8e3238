import { z } from 'zod';
import {
  ConfigurationError,
  LengthExceededError,
  TEXT_LIMITS,
  scoped,
  sleep,
  withRetry,
  type Logger,
  type PublishResult,
  type RetryOptions,
  type Visibility,
} from '@postcraft/shared';
import { LinkedInApiError, MediaValidationError } from './errors.js';

export interface LinkedInClientOptions {
  accessToken: string;
  personUrn: string;
  baseUrl?: string;
  apiVersion?: string;
  /** Log instead of calling the API (default true) */
  dryRun?: boolean;
  pollIntervalMs?: number;
  maxPollAttempts?: number;
  retry?: RetryOptions;
}

export const IMAGE_MIME_TYPES = ['image/jpeg', 'image/png', 'image/gif'] as const;
export type ImageMimeType = (typeof IMAGE_MIME_TYPES)[number];

const MAX_IMAGE_BYTES = 10 * 1024 * 1024;
const MIN_VIDEO_BYTES = 75 * 1024;
const MAX_VIDEO_BYTES = 500 * 1024 * 1024;

// ─── Response Schemas ───

const ImageUploadInit = z.object({
  value: z.object({ uploadUrl: z.string().url(), image: z.string() }),
});

const VideoUploadInit = z.object({
  value: z.object({
    video: z.string(),
    uploadToken: z.string().default(''),
    uploadInstructions: z
      .array(z.object({ uploadUrl: z.string().url(), firstByte: z.number().int(), lastByte: z.number().int() }))
      .min(1),
  }),
});

const VideoStatus = z.object({
  status: z.enum(['WAITING_UPLOAD', 'PROCESSING', 'AVAILABLE', 'PROCESSING_FAILED']),
});

const ErrorBody = z.object({ message: z.string() });

/** LinkedIn REST client for text posts and media uploads.
 * Defaults to dry-run mode: set dryRun=false to reach the API. */
export class LinkedInClient {
  readonly dryRun: boolean;
  private readonly baseUrl: string;
  private readonly apiVersion: string;
  private readonly pollIntervalMs: number;
  private readonly maxPollAttempts: number;
  private readonly logger: Logger;

  constructor(
    private options: LinkedInClientOptions,
    logger: Logger,
  ) {
    this.dryRun = options.dryRun ?? true;
    this.baseUrl = (options.baseUrl ?? 'https://api.linkedin.com').replace(/\/+$/, '');
    this.apiVersion = options.apiVersion ?? '202405';
    this.pollIntervalMs = options.pollIntervalMs ?? 5_000;
    this.maxPollAttempts = options.maxPollAttempts ?? 60;
    this.logger = scoped(logger, 'linkedin-client');
  }

  /** Names of the settings still missing for live publishing */
  missingConfig(): string[] {
    const missing: string[] = [];
    if (!this.options.accessToken) missing.push('LINKEDIN_ACCESS_TOKEN');
    if (!this.options.personUrn) missing.push('LINKEDIN_PERSON_URN');
    return missing;
  }

  // ─── Posts ───

  async publishText(text: string, visibility: Visibility = 'PUBLIC'): Promise<PublishResult> {
    const length = Array.from(text).length;
    if (length > TEXT_LIMITS.maxLength) throw new LengthExceededError(length, TEXT_LIMITS.maxLength);

    if (this.dryRun) {
      const postId = `urn:li:share:dry-run-${Date.now()}`;
      this.logger.info({ length, visibility }, 'DRY RUN: Would publish post');
      return { ok: true, postId, url: postUrl(postId) };
    }

    const missing = this.missingConfig();
    if (missing.length > 0) {
      return { ok: false, error: { message: `LinkedIn API not configured. Set ${missing.join(' and ')}` } };
    }

    try {
      const response = await this.call('publish post', `${this.baseUrl}/rest/posts`, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify({
          author: this.options.personUrn,
          commentary: text,
          visibility,
          distribution: { feedDistribution: 'MAIN_FEED', targetEntities: [], thirdPartyDistributionChannels: [] },
          lifecycleState: 'PUBLISHED',
          isReshareDisabledByAuthor: false,
        }),
      });

      const postId = response.headers.get('x-restli-id');
      if (!postId) throw new LinkedInApiError('LinkedIn accepted the post but returned no post id', response.status);

      this.logger.info({ postId, visibility }, 'Post published');
      return { ok: true, postId, url: postUrl(postId) };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      const statusCode = err instanceof LinkedInApiError ? err.statusCode : undefined;
      this.logger.error({ error: message, statusCode }, 'Publishing failed');
      return { ok: false, error: { message, statusCode } };
    }
  }

  // ─── Media ───

  /** Upload an image and return its URN: initialize, then PUT the bytes */
  async uploadImage(bytes: Uint8Array, mimeType: ImageMimeType): Promise<string> {
    if (!IMAGE_MIME_TYPES.includes(mimeType)) {
      throw new MediaValidationError(`Unsupported image type: ${mimeType}. Supported: ${IMAGE_MIME_TYPES.join(', ')}`);
    }
    if (bytes.byteLength > MAX_IMAGE_BYTES) {
      throw new MediaValidationError(`Image too large: ${formatMb(bytes.byteLength)}MB. Keep under 10MB`);
    }

    if (this.dryRun) {
      this.logger.info({ bytes: bytes.byteLength, mimeType }, 'DRY RUN: Would upload image');
      return `urn:li:image:dry-run-${Date.now()}`;
    }
    this.requireConfig();

    const init = ImageUploadInit.parse(
      await this.callJson('initialize image upload', `${this.baseUrl}/rest/images?action=initializeUpload`, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify({ initializeUploadRequest: { owner: this.options.personUrn } }),
      }),
    );

    await this.call('upload image', init.value.uploadUrl, {
      method: 'PUT',
      headers: { Authorization: `Bearer ${this.options.accessToken}`, 'Content-Type': mimeType },
      body: bytes,
    });

    this.logger.info({ image: init.value.image }, 'Image uploaded');
    return init.value.image;
  }

  /** Upload an MP4 and return its URN once processing completes:
   * initialize, PUT each part collecting ETags, finalize, then poll until AVAILABLE */
  async uploadVideo(bytes: Uint8Array): Promise<string> {
    if (bytes.byteLength < MIN_VIDEO_BYTES) {
      throw new MediaValidationError(`Video too small: ${(bytes.byteLength / 1024).toFixed(1)}KB. Minimum: 75KB`);
    }
    if (bytes.byteLength > MAX_VIDEO_BYTES) {
      throw new MediaValidationError(`Video too large: ${formatMb(bytes.byteLength)}MB. Maximum: 500MB`);
    }

    if (this.dryRun) {
      this.logger.info({ bytes: bytes.byteLength }, 'DRY RUN: Would upload video');
      return `urn:li:video:dry-run-${Date.now()}`;
    }
    this.requireConfig();

    const init = VideoUploadInit.parse(
      await this.callJson('initialize video upload', `${this.baseUrl}/rest/videos?action=initializeUpload`, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify({
          initializeUploadRequest: {
            owner: this.options.personUrn,
            fileSizeBytes: bytes.byteLength,
            uploadCaptions: false,
            uploadThumbnail: false,
          },
        }),
      }),
    );
    const { video, uploadToken, uploadInstructions } = init.value;

    const uploadedPartIds: string[] = [];
    for (const [index, part] of uploadInstructions.entries()) {
      const response = await this.call(`upload video part ${index + 1}`, part.uploadUrl, {
        method: 'PUT',
        headers: { 'Content-Type': 'application/octet-stream' },
        body: bytes.subarray(part.firstByte, part.lastByte + 1),
      });
      const etag = response.headers.get('etag');
      if (!etag) throw new LinkedInApiError(`Video part ${index + 1} returned no ETag`, response.status);
      uploadedPartIds.push(etag);
    }

    await this.call('finalize video upload', `${this.baseUrl}/rest/videos?action=finalizeUpload`, {
      method: 'POST',
      headers: this.headers(),
      body: JSON.stringify({ finalizeUploadRequest: { video, uploadToken, uploadedPartIds } }),
    });

    await this.waitForVideo(video);
    this.logger.info({ video, parts: uploadedPartIds.length }, 'Video uploaded');
    return video;
  }

  private async waitForVideo(video: string): Promise<void> {
    for (let attempt = 1; attempt <= this.maxPollAttempts; attempt++) {
      const { status } = VideoStatus.parse(
        await this.callJson('video status', `${this.baseUrl}/rest/videos/${encodeURIComponent(video)}`, {
          method: 'GET',
          headers: this.headers(),
        }),
      );

      if (status === 'AVAILABLE') return;
      if (status === 'PROCESSING_FAILED') throw new LinkedInApiError(`Video processing failed: ${video}`);

      this.logger.debug({ video, status, attempt }, 'Video still processing');
      await sleep(this.pollIntervalMs);
    }
    throw new LinkedInApiError(`Video processing timed out after ${this.maxPollAttempts} poll attempts`);
  }

  // ─── HTTP ───

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.options.accessToken}`,
      'Content-Type': 'application/json',
      'X-Restli-Protocol-Version': '2.0.0',
      'LinkedIn-Version': this.apiVersion,
    };
  }

  private requireConfig(): void {
    const missing = this.missingConfig();
    if (missing.length > 0) {
      throw new ConfigurationError(`LinkedIn API not configured. Set ${missing.join(' and ')}`, missing);
    }
  }

  private call(label: string, url: string, init: RequestInit): Promise<Response> {
    return withRetry(
      async () => {
        const response = await fetch(url, init);
        if (!response.ok) {
          const body = await response.text();
          const parsed = safeJson(body);
          const detail = ErrorBody.safeParse(parsed);
          throw new LinkedInApiError(
            `LinkedIn API error ${response.status}: ${detail.success ? detail.data.message : body}`,
            response.status,
            body,
          );
        }
        return response;
      },
      this.logger,
      label,
      this.options.retry,
    );
  }

  private async callJson(label: string, url: string, init: RequestInit): Promise<unknown> {
    const response = await this.call(label, url, init);
    return response.json();
  }
}

function postUrl(postId: string): string {
  return `https://www.linkedin.com/feed/update/${postId}/`;
}

function formatMb(bytes: number): string {
  return (bytes / 1024 / 1024).toFixed(1);
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
