import { describe, expect, it } from 'vitest';
import { UpstreamLookupError } from '../src/sync/errors';
import { resolveGroupMembers } from '../src/sync/identity-resolver';
import { FakeDirectory, group, silentLogger, user } from './fakes';

describe('resolveGroupMembers', () => {
  it('returns direct users', async () => {
    const directory = new FakeDirectory({
      'team@test.com': [user('a@test.com'), user('b@test.com')],
    });

    const members = await resolveGroupMembers(directory, 'team@test.com', silentLogger);

    expect([...members].sort()).toEqual(['a@test.com', 'b@test.com']);
  });

  it('flattens nested groups and ignores other member kinds', async () => {
    const directory = new FakeDirectory({
      'root@test.com': [
        user('a@test.com'),
        group('child@test.com'),
        { id: 'customer-123', kind: 'OTHER' },
      ],
      'child@test.com': [user('b@test.com'), group('grandchild@test.com')],
      'grandchild@test.com': [user('c@test.com'), user('a@test.com')],
    });

    const members = await resolveGroupMembers(directory, 'root@test.com', silentLogger);

    expect([...members].sort()).toEqual(['a@test.com', 'b@test.com', 'c@test.com']);
    expect(directory.calls).toEqual(['root@test.com', 'child@test.com', 'grandchild@test.com']);
  });

  it('terminates on a group that contains itself', async () => {
    const directory = new FakeDirectory({
      'self@test.com': [user('a@test.com'), group('self@test.com')],
    });

    const members = await resolveGroupMembers(directory, 'self@test.com', silentLogger);

    expect([...members]).toEqual(['a@test.com']);
    expect(directory.calls).toEqual(['self@test.com']);
  });

  it('visits each group of a membership cycle once', async () => {
    const directory = new FakeDirectory({
      'g1@test.com': [user('a@test.com'), group('g2@test.com')],
      'g2@test.com': [user('b@test.com'), group('g1@test.com')],
    });

    const members = await resolveGroupMembers(directory, 'g1@test.com', silentLogger);

    expect([...members].sort()).toEqual(['a@test.com', 'b@test.com']);
    expect(directory.calls).toEqual(['g1@test.com', 'g2@test.com']);
  });

  it('skips a nested group that no longer exists', async () => {
    const directory = new FakeDirectory({
      'root@test.com': [user('a@test.com'), group('deleted@test.com')],
    });

    const members = await resolveGroupMembers(directory, 'root@test.com', silentLogger);

    expect([...members]).toEqual(['a@test.com']);
  });

  it('fails when the top-level group cannot be read', async () => {
    const directory = new FakeDirectory({});

    await expect(
      resolveGroupMembers(directory, 'missing@test.com', silentLogger),
    ).rejects.toBeInstanceOf(UpstreamLookupError);
  });

  it('returns an empty set for a group with no members', async () => {
    const directory = new FakeDirectory({ 'empty-group@test.com': [] });

    const members = await resolveGroupMembers(directory, 'empty-group@test.com', silentLogger);

    expect(members.size).toBe(0);
  });
});
