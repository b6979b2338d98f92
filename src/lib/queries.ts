/** Tags GraphQL documents for editor tooling; the text is kept verbatim. */
const gql = String.raw;

export const searchRepositoriesQuery = gql`
  query SearchRepositories($searchQuery: String!, $first: Int!, $cursor: String) {
    search(query: $searchQuery, type: REPOSITORY, first: $first, after: $cursor) {
      nodes {
        ... on Repository {
          name
          owner {
            login
          }
          url
          description
          stargazerCount
          forkCount
          createdAt
          updatedAt
          primaryLanguage {
            name
          }
          licenseInfo {
            name
          }
        }
      }
      pageInfo {
        endCursor
        hasNextPage
      }
    }
  }
`;

export const repositoryPullRequestCountQuery = gql`
  query RepositoryPullRequestCount($owner: String!, $name: String!) {
    repository(owner: $owner, name: $name) {
      pullRequests(states: [MERGED, CLOSED]) {
        totalCount
      }
    }
  }
`;

export const pullRequestsQuery = gql`
  query PullRequests($owner: String!, $name: String!, $first: Int!, $cursor: String) {
    repository(owner: $owner, name: $name) {
      pullRequests(first: $first, after: $cursor, states: [MERGED, CLOSED]) {
        totalCount
        pageInfo {
          endCursor
          hasNextPage
        }
        nodes {
          number
          state
          createdAt
          mergedAt
          closedAt
        }
      }
    }
  }
`;

export const pullRequestDetailsQuery = gql`
  query PullRequestDetails($owner: String!, $name: String!, $number: Int!) {
    repository(owner: $owner, name: $name) {
      pullRequest(number: $number) {
        title
        bodyText
        changedFiles
        additions
        deletions
      }
    }
  }
`;

export const pullRequestReviewCountQuery = gql`
  query PullRequestReviewCount($owner: String!, $name: String!, $number: Int!) {
    repository(owner: $owner, name: $name) {
      pullRequest(number: $number) {
        reviews {
          totalCount
        }
      }
    }
  }
`;

export const pullRequestCommentCountQuery = gql`
  query PullRequestCommentCount($owner: String!, $name: String!, $number: Int!) {
    repository(owner: $owner, name: $name) {
      pullRequest(number: $number) {
        comments {
          totalCount
        }
      }
    }
  }
`;

export const pullRequestParticipantCountQuery = gql`
  query PullRequestParticipantCount($owner: String!, $name: String!, $number: Int!) {
    repository(owner: $owner, name: $name) {
      pullRequest(number: $number) {
        participants {
          totalCount
        }
      }
    }
  }
`;
