// GraphQL query and mutation definitions

export const VIEWER_LOGIN_QUERY = /* GraphQL */ `
  query ViewerLogin {
    viewer {
      login
    }
  }
`;

export const USER_REPOS_QUERY = /* GraphQL */ `
  query UserRepos($who: String!, $first: Int!, $curs: String = null) {
    user(login: $who) {
      repositories(affiliations: OWNER, isFork: false, first: $first, after: $curs) {
        nodes {
          nameWithOwner
          isArchived
          defaultBranchRef {
            name
          }
        }
        pageInfo {
          hasNextPage
          endCursor
        }
      }
    }
  }
`;

export const PR_FILES_QUERY = /* GraphQL */ `
  query PrFiles(
    $name: String!
    $owner: String!
    $after: String = null
    $states: [PullRequestState!]
    $first: Int!
    $filesFirst: Int!
  ) {
    repository(name: $name, owner: $owner) {
      pullRequests(after: $after, first: $first, states: $states) {
        pageInfo {
          endCursor
          hasNextPage
        }
        nodes {
          files(first: $filesFirst) {
            nodes {
              path
            }
            pageInfo {
              hasNextPage
            }
          }
          title
          url
        }
      }
    }
  }
`;

export const BRANCH_INFO_QUERY = /* GraphQL */ `
  query BranchInfo($owner: String!, $repoName: String!, $branch: String!) {
    repository(owner: $owner, name: $repoName) {
      id
      ref(qualifiedName: $branch) {
        target {
          oid
        }
      }
    }
  }
`;

export const CREATE_REF_MUTATION = /* GraphQL */ `
  mutation CreateRef($repoId: ID!, $branch: String!, $newSha: GitObjectID!) {
    createRef(input: { repositoryId: $repoId, name: $branch, oid: $newSha }) {
      ref {
        name
        target {
          oid
        }
      }
    }
  }
`;
