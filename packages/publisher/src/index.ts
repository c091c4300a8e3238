export {
  LinkedInClient,
  IMAGE_MIME_TYPES,
  type ImageMimeType,
  type LinkedInClientOptions,
} from './linkedin-client.js';
export { LinkedInApiError, MediaValidationError } from './errors.js';
export { createLinkedInClient } from './factory.js';
