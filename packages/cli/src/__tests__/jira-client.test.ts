/**
 * JiraClient Unit Tests
 * Runs against an in-process HTTP stand-in for the Jira REST API
 */

import { AuthenticationError } from '@jira-branch-checker/shared';
import { DEFAULT_JIRA_URL } from '../config';
import { JiraClient, describeIssueStatus } from '../jira-client';
import { JiraStub, basicAuthHeader, unreachableBaseUrl } from './helpers/jira-stub';

describe('JiraClient', () => {
  let stub: JiraStub;
  let baseUrl: string;

  beforeEach(async () => {
    stub = new JiraStub();
    baseUrl = await stub.start();
  });

  afterEach(async () => {
    await stub.stop();
  });

  describe('getTicketStatus', () => {
    it('should combine status and resolution', async () => {
      stub.issue('PROJ-12', { status: { name: 'Done' }, resolution: { name: 'Fixed' } });
      const client = new JiraClient({ baseUrl });

      expect(await client.getTicketStatus('PROJ-12')).toBe('Done: Fixed');
    });

    it('should return the bare status when unresolved', async () => {
      stub.issue('PROJ-13', { status: { name: 'In Progress' }, resolution: null });
      const client = new JiraClient({ baseUrl });

      expect(await client.getTicketStatus('PROJ-13')).toBe('In Progress');
    });

    it('should default to Unknown without a status field', async () => {
      stub.issue('PROJ-14', {});
      const client = new JiraClient({ baseUrl });

      expect(await client.getTicketStatus('PROJ-14')).toBe('Unknown');
    });

    it('should request the issue endpoint with the ticket escaped', async () => {
      const client = new JiraClient({ baseUrl });

      await client.getTicketStatus('PROJ-12');
      await client.getTicketStatus('A/B-1');

      expect(stub.requests.map((r) => r.path)).toEqual([
        '/rest/api/2/issue/PROJ-12',
        '/rest/api/2/issue/A%2FB-1',
      ]);
    });

    it('should send basic auth when credentials are given', async () => {
      stub.issue('PROJ-12', { status: { name: 'Open' } });
      const client = new JiraClient({ baseUrl, auth: { username: 'alice@example.com', token: 'test-token' } });

      await client.getTicketStatus('PROJ-12');

      expect(stub.requests[0].authorization).toBe(basicAuthHeader('alice@example.com', 'test-token'));
    });

    it('should send no credentials for anonymous access', async () => {
      const client = new JiraClient({ baseUrl });

      await client.getTicketStatus('PROJ-12');

      expect(stub.requests[0].authorization).toBeUndefined();
    });

    it('should report other status codes as an error placeholder', async () => {
      stub.on('/rest/api/2/issue/GONE-1', { status: 500, body: { message: 'boom' } });
      const client = new JiraClient({ baseUrl });

      expect(await client.getTicketStatus('MISSING-1')).toBe('Error: 404');
      expect(await client.getTicketStatus('GONE-1')).toBe('Error: 500');
    });

    it('should fail on 401 with the server URL', async () => {
      stub.on('/rest/api/2/issue/PROJ-12', { status: 401, body: {} });
      const client = new JiraClient({ baseUrl, auth: { username: 'alice', token: 'expired-token' } });

      const status = client.getTicketStatus('PROJ-12');

      await expect(status).rejects.toBeInstanceOf(AuthenticationError);
      await expect(status).rejects.toThrow(`Authentication failed for ${baseUrl}`);
    });

    it('should turn an unparseable body into an error placeholder', async () => {
      stub.on('/rest/api/2/issue/PROJ-12', { status: 200, body: '{"fields": ' });
      const client = new JiraClient({ baseUrl });

      const status = await client.getTicketStatus('PROJ-12');

      expect(status.startsWith('Error: ')).toBe(true);
      expect(status).not.toBe('Error: 200');
    });

    it('should turn transport failures into an error placeholder', async () => {
      const client = new JiraClient({ baseUrl: await unreachableBaseUrl() });

      expect(await client.getTicketStatus('PROJ-12')).toMatch(/^Error: .*ECONNREFUSED/);
    });

    it('should refuse anonymous access to the default server', async () => {
      const client = new JiraClient({ baseUrl: DEFAULT_JIRA_URL });

      await expect(client.getTicketStatus('PROJ-12')).rejects.toThrow(
        'Authentication is required for the default Jira server'
      );
    });
  });

  describe('testConnection', () => {
    it('should accept a 200 from /myself', async () => {
      stub.on('/rest/api/2/myself', { status: 200, body: { name: 'alice' } });
      const client = new JiraClient({ baseUrl, auth: { username: 'alice', token: 'test-token' } });

      expect(await client.testConnection()).toBe(true);
      expect(stub.requests[0]).toEqual({
        method: 'GET',
        path: '/rest/api/2/myself',
        authorization: basicAuthHeader('alice', 'test-token'),
      });
    });

    it('should reject any other status', async () => {
      stub.on('/rest/api/2/myself', { status: 403, body: {} });
      const client = new JiraClient({ baseUrl, auth: { username: 'alice', token: 'test-token' } });

      expect(await client.testConnection()).toBe(false);
    });

    it('should propagate transport failures', async () => {
      const client = new JiraClient({ baseUrl: await unreachableBaseUrl() });

      await expect(client.testConnection()).rejects.toThrow(/ECONNREFUSED/);
    });
  });

  it('should build browse links', () => {
    expect(new JiraClient({ baseUrl }).browseLink('PROJ-12')).toBe(`${baseUrl}/browse/PROJ-12`);
  });
});

describe('describeIssueStatus', () => {
  it('should ignore an empty resolution name', () => {
    expect(describeIssueStatus({ fields: { status: { name: 'Open' }, resolution: { name: '' } } })).toBe('Open');
  });

  it('should tolerate payloads that are not objects', () => {
    expect(describeIssueStatus(null)).toBe('Unknown');
    expect(describeIssueStatus('nope')).toBe('Unknown');
  });
});
