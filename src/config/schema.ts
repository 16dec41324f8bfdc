// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { z } from 'zod';

export const DEFAULT_SKIP_BRANCHES = ['main', 'master', 'develop', 'dev'];

// Sample tracker URL; counts as not configured
export const PLACEHOLDER_TRACKER_URL = 'https://yourcompany.atlassian.net/browse/';

// Ticket tracker (Jira-style REST API v2)
const TrackerConfigSchema = z.object({
  // Browse base URL, ticket keys are appended (e.g. "https://jira.example.com/browse/")
  base_url: z.string().default(''),
  // Personal access token sent as a bearer token
  token: z.string().default(''),
});

// Code review server (Bitbucket-Server-style REST API)
const ReviewConfigSchema = z.object({
  // Personal access token sent as a bearer token
  token: z.string().default(''),
});

// Commit message composition
const CommitConfigSchema = z.object({
  // Branches never used as a ticket reference source
  skip_branches: z.array(z.string().min(1)).default(() => [...DEFAULT_SKIP_BRANCHES]),
});

// Logging configuration
const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

// Main configuration schema
export const LinkConfigSchema = z.object({
  version: z.string().default('1.0'),
  tracker: TrackerConfigSchema.default({}),
  review: ReviewConfigSchema.default({}),
  commit: CommitConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

// Export types
export type TrackerConfig = z.infer<typeof TrackerConfigSchema>;
export type ReviewConfig = z.infer<typeof ReviewConfigSchema>;
export type CommitConfig = z.infer<typeof CommitConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LinkConfig = z.infer<typeof LinkConfigSchema>;

/**
 * Credentials snapshot handed to every resolution call.
 * Read fresh per operation; the engine never keeps one around.
 */
export interface ResolutionConfig {
  ticketBaseUrl: string;
  ticketToken: string;
  reviewToken: string;
}

// Default configuration
export const DEFAULT_CONFIG: LinkConfig = LinkConfigSchema.parse({});

export function toResolutionConfig(config: LinkConfig): ResolutionConfig {
  return {
    ticketBaseUrl: config.tracker.base_url,
    ticketToken: config.tracker.token,
    reviewToken: config.review.token,
  };
}

/**
 * True when the tracker base URL is usable for building links.
 */
export function isTrackerConfigured(baseUrl: string): boolean {
  const trimmed = baseUrl.trim();
  return trimmed.length > 0 && trimmed !== PLACEHOLDER_TRACKER_URL;
}

// Generate default config YAML content
export function generateDefaultConfigYaml(): string {
  return `# branchlink configuration
version: "1.0"

# Ticket tracker
tracker:
  # Browse URL prefix; ticket keys are appended to it
  base_url: ""
  # Personal access token (or set BRANCHLINK_TRACKER_TOKEN)
  token: ""

# Code review server
review:
  # Personal access token (or set BRANCHLINK_REVIEW_TOKEN)
  token: ""

# Commit message hook
commit:
  skip_branches:
    - main
    - master
    - develop
    - dev

# Logging
logging:
  level: info
`;
}
