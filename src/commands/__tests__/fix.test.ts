import { describe, it, expect } from 'vitest';
import { fixRepository, runFix } from '../fix';
import { BRANCH_INFO_QUERY, CREATE_REF_MUTATION } from '../../services/github/queries';
import type { GraphQLResponse } from '../../services/github';
import { createTestContext, stubFetch, type RecordedQuery } from '../../test/helpers/fakes';

const resolvedBranch: GraphQLResponse = {
  data: { repository: { id: 'R_test1', ref: { target: { oid: 'abc123' } } } }
};

const createdRef: GraphQLResponse = {
  data: { createRef: { ref: { name: 'refs/heads/main', target: { oid: 'abc123' } } } }
};

function respond(byQuery: Map<string, GraphQLResponse>) {
  return (req: RecordedQuery): GraphQLResponse => {
    const res = byQuery.get(req.query);
    if (!res) throw new Error('Unexpected query');
    return res;
  };
}

describe('fixRepository', () => {
  it('should create the new branch at the source tip and make it the default', async () => {
    const fetchMock = stubFetch(200);
    const { ctx, client, lines } = createTestContext(
      respond(new Map([[BRANCH_INFO_QUERY, resolvedBranch], [CREATE_REF_MUTATION, createdRef]]))
    );

    await expect(fixRepository(ctx, 'octocat/hello-world', 'main')).resolves.toBe(true);

    expect(client.calls.map((c) => c.variables)).toEqual([
      { owner: 'octocat', repoName: 'hello-world', branch: 'master' },
      { repoId: 'R_test1', branch: 'refs/heads/main', newSha: 'abc123' }
    ]);
    expect(fetchMock.mock.calls[0][0]).toBe('https://api.github.com/repos/octocat/hello-world');
    expect(fetchMock.mock.calls[0][1]?.body).toBe('{"default_branch":"main"}');
    expect(lines).toEqual([
      'Jan 02 03:04:05 INFO test: Processing octocat/hello-world',
      'Jan 02 03:04:05 INFO test: >> octocat/hello-world master is abc123',
      'Jan 02 03:04:05 INFO test: Done octocat/hello-world'
    ]);
  });

  it('should log a ref creation error and still update the default branch', async () => {
    const fetchMock = stubFetch(200);
    const { ctx, lines } = createTestContext(
      respond(
        new Map([
          [BRANCH_INFO_QUERY, resolvedBranch],
          [CREATE_REF_MUTATION, { data: { createRef: null }, errors: [{ message: 'A ref named "refs/heads/main" already exists in the repository.' }] }]
        ])
      )
    );

    await expect(fixRepository(ctx, 'octocat/hello-world', 'main')).resolves.toBe(false);

    expect(lines).toContain(
      'Jan 02 03:04:05 ERROR test: Error making a new branch in octocat/hello-world: A ref named "refs/heads/main" already exists in the repository.'
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(lines[lines.length - 1]).toBe('Jan 02 03:04:05 INFO test: Done octocat/hello-world');
  });

  it('should carry on with nulls when the source branch is missing', async () => {
    stubFetch(200);
    const { ctx, client, lines } = createTestContext(
      respond(
        new Map([
          [BRANCH_INFO_QUERY, { data: { repository: { id: 'R_test1', ref: null } } }],
          [CREATE_REF_MUTATION, { data: { createRef: null }, errors: [{ message: 'Variable $newSha of type GitObjectID! was provided invalid value' }] }]
        ])
      )
    );

    await expect(fixRepository(ctx, 'octocat/hello-world', 'main')).resolves.toBe(false);

    expect(client.calls[1].variables).toEqual({ repoId: 'R_test1', branch: 'refs/heads/main', newSha: null });
    expect(lines[1]).toBe('Jan 02 03:04:05 INFO test: >> octocat/hello-world master is unresolved');
    expect(lines[2]).toBe(
      'Jan 02 03:04:05 WARN test: Could not resolve master in octocat/hello-world, the following steps will likely fail {"repositoryId":"R_test1","tipOid":null}'
    );
  });

  it('should include GitHub\'s reason when the repository cannot be resolved', async () => {
    stubFetch(200);
    const { ctx, lines } = createTestContext(
      respond(
        new Map([
          [BRANCH_INFO_QUERY, { data: { repository: null }, errors: [{ message: "Could not resolve to a Repository with the name 'octocat/gone'." }] }],
          [CREATE_REF_MUTATION, createdRef]
        ])
      )
    );

    await fixRepository(ctx, 'octocat/gone', 'main');

    expect(lines).toContain(
      "Jan 02 03:04:05 WARN test: Could not resolve master in octocat/gone (Could not resolve to a Repository with the name 'octocat/gone'.), the following steps will likely fail {\"repositoryId\":null,\"tipOid\":null}"
    );
  });

  it('should release the body of a successful default branch update', async () => {
    const fetchMock = stubFetch(200, { default_branch: 'main' });
    const { ctx } = createTestContext(
      respond(new Map([[BRANCH_INFO_QUERY, resolvedBranch], [CREATE_REF_MUTATION, createdRef]]))
    );

    await fixRepository(ctx, 'octocat/hello-world', 'main');

    const res: Response = await fetchMock.mock.results[0].value;
    expect(res.bodyUsed).toBe(true);
  });

  it('should log a failed default branch update', async () => {
    stubFetch(422, { message: 'Validation Failed' });
    const { ctx, lines } = createTestContext(
      respond(new Map([[BRANCH_INFO_QUERY, resolvedBranch], [CREATE_REF_MUTATION, createdRef]]))
    );

    await expect(fixRepository(ctx, 'octocat/hello-world', 'main')).resolves.toBe(false);

    expect(lines).toContain(
      'Jan 02 03:04:05 ERROR test: Got error updating default branch in octocat/hello-world: status 422: Validation Failed'
    );
  });

  it('should use the configured source branch', async () => {
    stubFetch(200);
    const { ctx, client } = createTestContext(
      respond(new Map([[BRANCH_INFO_QUERY, resolvedBranch], [CREATE_REF_MUTATION, createdRef]])),
      { sourceBranch: 'trunk' }
    );

    await fixRepository(ctx, 'octocat/hello-world', 'main');

    expect(client.calls[0].variables.branch).toBe('trunk');
  });
});

describe('runFix', () => {
  it('should process every repository even when one fails', async () => {
    const fetchMock = stubFetch(200);
    const { ctx, client } = createTestContext((req) => {
      if (req.query === BRANCH_INFO_QUERY) return resolvedBranch;
      if (req.variables.repoId === 'R_test1' && client.calls.length === 2) {
        return { data: { createRef: null }, errors: [{ message: 'Resource not accessible by integration' }] };
      }
      return createdRef;
    });

    const summary = await runFix(ctx, ['octocat/one', 'octocat/two']);

    expect(summary).toEqual({ processed: 2, failed: ['octocat/one'] });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(client.calls).toHaveLength(4);
  });

  it('should default the new branch to the configured one', async () => {
    const fetchMock = stubFetch(200);
    const { ctx, client } = createTestContext(
      respond(new Map([[BRANCH_INFO_QUERY, resolvedBranch], [CREATE_REF_MUTATION, createdRef]])),
      { newBranch: 'trunk' }
    );

    await runFix(ctx, ['octocat/hello-world']);

    expect(client.calls[1].variables.branch).toBe('refs/heads/trunk');
    expect(fetchMock.mock.calls[0][1]?.body).toBe('{"default_branch":"trunk"}');
  });
});
