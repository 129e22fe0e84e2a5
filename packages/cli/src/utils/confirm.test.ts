import { describe, it, expect, vi, beforeEach } from 'vitest';
import { confirm } from './confirm';
import inquirer from 'inquirer';

vi.mock('inquirer', () => ({
  default: {
    prompt: vi.fn(),
  },
}));

describe('confirm', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    Object.defineProperty(process.stdin, 'isTTY', { value: true, configurable: true });
  });

  it('approves without prompting under --yes', async () => {
    await expect(confirm('Delete', undefined, true, { yes: true })).resolves.toBe(true);
    expect(inquirer.prompt).not.toHaveBeenCalled();
  });

  it('declines in non-interactive mode', async () => {
    await expect(confirm('Delete', undefined, true, { nonInteractive: true })).resolves.toBe(false);
    expect(inquirer.prompt).not.toHaveBeenCalled();
  });

  it('declines when stdin is not a TTY', async () => {
    Object.defineProperty(process.stdin, 'isTTY', { value: false, configurable: true });

    await expect(confirm('Delete')).resolves.toBe(false);
    expect(inquirer.prompt).not.toHaveBeenCalled();
  });

  it('returns the answer of an interactive prompt', async () => {
    vi.mocked(inquirer.prompt).mockResolvedValueOnce({ confirmed: true });

    await expect(confirm('Delete repository', 'Vectors are removed too')).resolves.toBe(true);
    expect(inquirer.prompt).toHaveBeenCalledWith([
      {
        type: 'confirm',
        name: 'confirmed',
        message: 'Delete repository\nVectors are removed too',
        default: false,
      },
    ]);
  });
});
