import { graphql, GraphqlResponseError } from '@octokit/graphql';
import { API_BASE, USER_AGENT } from '../../config/constants';

/**
 * One entry of a GraphQL `errors` list
 */
export interface GraphQLErrorInfo {
  message: string;
  type?: string;
  path?: ReadonlyArray<string | number>;
}

/**
 * Decoded GraphQL response body. `errors` is left for the caller to check.
 */
export interface GraphQLResponse {
  data: unknown;
  errors?: GraphQLErrorInfo[];
}

export type GraphQLVariables = Record<string, unknown>;

/**
 * Sends a query/variables payload to the GitHub GraphQL endpoint
 */
export interface GraphQLClient {
  query(query: string, variables?: GraphQLVariables): Promise<GraphQLResponse>;
}

export interface ClientOptions {
  /** fetch implementation handed to @octokit/request; defaults to the global one */
  fetch?: typeof fetch;
}

/**
 * Creates an @octokit/graphql function bound to the GitHub endpoint and token
 *
 * @param token - GitHub personal access token
 * @returns Configured graphql function
 * @example
 * ```typescript
 * const gql = makeClient(token);
 * const res = await gql('query { viewer { login } }');
 * ```
 */
export function makeClient(token: string, options: ClientOptions = {}) {
  return graphql.defaults({
    baseUrl: API_BASE,
    headers: {
      authorization: `token ${token}`,
      'user-agent': USER_AGENT
    },
    request: options.fetch ? { fetch: options.fetch } : {}
  });
}

/**
 * Wraps {@link makeClient} so that GraphQL-level errors come back as part of
 * the response instead of being thrown.
 *
 * Transport failures (network, non-2xx status, undecodable body) are thrown
 * unmodified. Nothing is retried.
 *
 * @example
 * ```typescript
 * const client = createGraphQLClient(token);
 * const res = await client.query(VIEWER_LOGIN_QUERY);
 * if (res.errors) {
 *   res.errors.forEach((e) => logger.error(e.message));
 * }
 * ```
 */
export function createGraphQLClient(token: string, options: ClientOptions = {}): GraphQLClient {
  const gql = makeClient(token, options);
  return {
    async query(query, variables = {}) {
      try {
        const data = await gql<unknown>(query, variables);
        return { data };
      } catch (error) {
        if (error instanceof GraphqlResponseError) {
          const errors: GraphQLErrorInfo[] = [];
          for (const e of error.errors ?? []) {
            errors.push({ message: e.message, type: e.type, path: e.path });
          }
          const data: unknown = error.data;
          return { data: data ?? null, errors };
        }
        throw error;
      }
    }
  };
}
