/**
 * GitHub Service API - Public Interface
 *
 * GraphQL client, generic pagination, repository and pull request queries,
 * the createRef mutation and REST settings updates.
 *
 * @module services/github
 */

export {
  makeClient,
  createGraphQLClient,
  type GraphQLClient,
  type GraphQLResponse,
  type GraphQLErrorInfo,
  type GraphQLVariables
} from './client';

export {
  paginate,
  collect,
  mapPage,
  fromApiResponse,
  type Page,
  type PagedQuery
} from './pagination';

export {
  RepoListQuery,
  shouldListRepo,
  getViewerLogin,
  getBranchInfo,
  type RepoListNode,
  type RepoListOptions
} from './repositories';

export {
  PrFilesQuery,
  findPrsFor,
  statesFor,
  makeMatcher,
  matchSimple,
  matchRegex,
  matchAllOnAnyFile,
  type Matcher,
  type FilesMatcher,
  type MatchMode,
  type StatusFilter,
  type PrFilesOptions
} from './pullRequests';

export { createRef } from './mutations';

export { patchRepository, setDefaultBranch, describeFailure, discardBody } from './rest';
