// GitHub endpoints
export const API_BASE = 'https://api.github.com';
export const GRAPHQL_ENDPOINT = `${API_BASE}/graphql`;
export const REST_ACCEPT = 'application/vnd.github.v3+json';
export const USER_AGENT = 'gh-graft';

// Branches
export const DEFAULT_SOURCE_BRANCH = 'master';
export const DEFAULT_NEW_BRANCH = 'main';

// Page sizes (GitHub caps connections at 100)
export const REPOS_PAGE_SIZE = 100;
export const PULL_REQUESTS_PAGE_SIZE = 50;
export const PR_FILES_PAGE_SIZE = 100;

// Environment
export const TOKEN_ENV_VARS = ['GH_ACCESS_TOKEN', 'GITHUB_TOKEN', 'GH_TOKEN'] as const;
export const LOG_LEVEL_ENV_VAR = 'GH_GRAFT_LOG_LEVEL';
