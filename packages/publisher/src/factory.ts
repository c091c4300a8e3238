import { loadPublisherConfig, type Logger } from '@postcraft/shared';
import { LinkedInClient } from './linkedin-client.js';

/** Client built from the environment (LINKEDIN_* and DRY_RUN) */
export function createLinkedInClient(logger: Logger): LinkedInClient {
  const config = loadPublisherConfig();
  return new LinkedInClient(
    {
      accessToken: config.linkedinAccessToken,
      personUrn: config.linkedinPersonUrn,
      baseUrl: config.linkedinApiBaseUrl,
      apiVersion: config.linkedinApiVersion,
      dryRun: config.dryRun,
    },
    logger,
  );
}
