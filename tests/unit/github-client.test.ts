import { GitHubClient } from '../../src/lib/github-client';
import { Octokit } from '@octokit/rest';

// Mock Octokit
jest.mock('@octokit/rest');

// Request pages until one comes back short, as Octokit's paginate does
async function paginatePages(
  method: jest.Mock,
  params: { per_page: number }
): Promise<unknown[]> {
  const items: unknown[] = [];
  for (let page = 1; ; page++) {
    const { data } = await method({ ...params, page });
    items.push(...data);
    if (data.length < params.per_page) return items;
  }
}

describe('GitHubClient', () => {
  let client: GitHubClient;
  let mockOctokit: {
    issues: Record<
      'create' | 'update' | 'listMilestones' | 'createMilestone' | 'listLabelsForRepo' | 'createLabel',
      jest.Mock
    >;
    repos: { get: jest.Mock };
    paginate: jest.Mock;
  };

  beforeEach(() => {
    mockOctokit = {
      issues: {
        create: jest.fn(),
        update: jest.fn(),
        listMilestones: jest.fn(),
        createMilestone: jest.fn(),
        listLabelsForRepo: jest.fn(),
        createLabel: jest.fn(),
      },
      repos: {
        get: jest.fn(),
      },
      paginate: jest.fn(paginatePages),
    };

    (Octokit as unknown as jest.Mock).mockImplementation(() => mockOctokit);

    client = new GitHubClient('test-token', 'owner/repo');
  });

  describe('constructor', () => {
    it('should parse repo full name correctly', () => {
      expect(client.fullName).toBe('owner/repo');
    });

    it('should throw error for invalid repo format', () => {
      expect(() => new GitHubClient('token', 'invalid')).toThrow(
        'Invalid repo format: invalid. Expected "owner/repo"'
      );
      expect(() => new GitHubClient('token', 'owner/')).toThrow('Invalid repo format: owner/');
    });
  });

  describe('createIssue', () => {
    it('should create an issue and return its number', async () => {
      mockOctokit.issues.create.mockResolvedValue({ data: { number: 10 } });

      const number = await client.createIssue('New Issue', 'Issue body', ['modbus']);

      expect(number).toBe(10);
      expect(mockOctokit.issues.create).toHaveBeenCalledWith({
        owner: 'owner',
        repo: 'repo',
        title: 'New Issue',
        body: 'Issue body',
        labels: ['modbus'],
      });
    });
  });

  describe('setIssueMilestone', () => {
    it('should update the issue milestone', async () => {
      mockOctokit.issues.update.mockResolvedValue({ data: {} });

      await client.setIssueMilestone(10, 3);

      expect(mockOctokit.issues.update).toHaveBeenCalledWith({
        owner: 'owner',
        repo: 'repo',
        issue_number: 10,
        milestone: 3,
      });
    });
  });

  describe('findMilestone', () => {
    it('should return the number of a milestone with the same title', async () => {
      mockOctokit.issues.listMilestones.mockResolvedValue({
        data: [
          { title: 'Alpha', number: 1 },
          { title: 'Foundation', number: 4 },
        ],
      });

      expect(await client.findMilestone('Foundation')).toBe(4);
      expect(mockOctokit.paginate).toHaveBeenCalledWith(mockOctokit.issues.listMilestones, {
        owner: 'owner',
        repo: 'repo',
        state: 'all',
        per_page: 100,
      });
    });

    it('should find a milestone beyond the first page', async () => {
      const firstPage = Array.from({ length: 100 }, (_, i) => ({ title: `Sprint ${i + 1}`, number: i + 1 }));
      mockOctokit.issues.listMilestones
        .mockResolvedValueOnce({ data: firstPage })
        .mockResolvedValueOnce({ data: [{ title: 'Foundation', number: 101 }] });

      expect(await client.findMilestone('Foundation')).toBe(101);
      expect(mockOctokit.issues.listMilestones).toHaveBeenCalledTimes(2);
      expect(mockOctokit.issues.listMilestones).toHaveBeenLastCalledWith({
        owner: 'owner',
        repo: 'repo',
        state: 'all',
        per_page: 100,
        page: 2,
      });
    });

    it('should return null when no milestone matches', async () => {
      mockOctokit.issues.listMilestones.mockResolvedValue({ data: [{ title: 'Alpha', number: 1 }] });

      expect(await client.findMilestone('Foundation')).toBeNull();
    });
  });

  describe('createMilestone', () => {
    it('should create a milestone and return its number', async () => {
      mockOctokit.issues.createMilestone.mockResolvedValue({ data: { number: 5 } });

      const number = await client.createMilestone('Foundation', 'Get building');

      expect(number).toBe(5);
      expect(mockOctokit.issues.createMilestone).toHaveBeenCalledWith({
        owner: 'owner',
        repo: 'repo',
        title: 'Foundation',
        description: 'Get building',
      });
    });
  });

  describe('ensureLabels', () => {
    it('should create only missing labels and cache the label list', async () => {
      mockOctokit.issues.listLabelsForRepo.mockResolvedValue({ data: [{ name: 'rust' }] });
      mockOctokit.issues.createLabel.mockResolvedValue({ data: {} });

      await client.ensureLabels(['rust', 'modbus']);
      await client.ensureLabels(['modbus', 'testing']);

      expect(mockOctokit.issues.listLabelsForRepo).toHaveBeenCalledTimes(1);
      expect(mockOctokit.issues.createLabel).toHaveBeenCalledTimes(2);
      expect(mockOctokit.issues.createLabel).toHaveBeenNthCalledWith(1, {
        owner: 'owner',
        repo: 'repo',
        name: 'modbus',
        color: 'ededed',
      });
      expect(mockOctokit.issues.createLabel).toHaveBeenNthCalledWith(2, {
        owner: 'owner',
        repo: 'repo',
        name: 'testing',
        color: 'ededed',
      });
    });

    it('should treat label names case-insensitively', async () => {
      mockOctokit.issues.listLabelsForRepo.mockResolvedValue({ data: [{ name: 'Testing' }] });
      mockOctokit.issues.createLabel.mockResolvedValue({ data: {} });

      await client.ensureLabels(['testing', 'Modbus']);
      await client.ensureLabels(['modbus']);

      expect(mockOctokit.issues.createLabel).toHaveBeenCalledTimes(1);
      expect(mockOctokit.issues.createLabel).toHaveBeenCalledWith({
        owner: 'owner',
        repo: 'repo',
        name: 'Modbus',
        color: 'ededed',
      });
    });

    it('should read labels from every page', async () => {
      const firstPage = Array.from({ length: 100 }, (_, i) => ({ name: `area-${i + 1}` }));
      mockOctokit.issues.listLabelsForRepo
        .mockResolvedValueOnce({ data: firstPage })
        .mockResolvedValueOnce({ data: [{ name: 'modbus' }] });

      await client.ensureLabels(['modbus', 'area-7']);

      expect(mockOctokit.issues.listLabelsForRepo).toHaveBeenCalledTimes(2);
      expect(mockOctokit.issues.createLabel).not.toHaveBeenCalled();
    });
  });

  describe('verifyAccess', () => {
    it('should return true when the repository is readable', async () => {
      mockOctokit.repos.get.mockResolvedValue({ data: {} });

      expect(await client.verifyAccess()).toBe(true);
    });

    it('should return false when the request fails', async () => {
      mockOctokit.repos.get.mockRejectedValue({ status: 404 });

      expect(await client.verifyAccess()).toBe(false);
    });
  });
});
