import { PassThrough } from 'stream';
import { InquirerPrompter, promptMessage, ReadlinePrompter } from './prompt';
import { ErrorCode } from '../errors/types';

const mockPrompt = jest.fn();

jest.mock('inquirer', () => ({
  prompt: (...args: unknown[]) => mockPrompt(...args),
}));

function readlinePrompter(): { prompter: ReadlinePrompter; input: PassThrough; written: () => string } {
  const input = new PassThrough();
  const output = new PassThrough();
  let text = '';
  output.on('data', (chunk: Buffer) => {
    text += chunk.toString();
  });
  return { prompter: new ReadlinePrompter(input, output), input, written: () => text };
}

describe('promptMessage', () => {
  it('names the valid range', () => {
    expect(promptMessage(4)).toBe('Choose subtitle [1-4], q to quit:');
  });
});

describe('ReadlinePrompter', () => {
  it('returns one line per question', async () => {
    const { prompter, input, written } = readlinePrompter();
    input.write('abc\n2\n');

    await expect(prompter.ask(3)).resolves.toBe('abc');
    await expect(prompter.ask(3)).resolves.toBe('2');
    expect(written()).toBe('Choose subtitle [1-3], q to quit: Choose subtitle [1-3], q to quit: ');

    prompter.close();
  });

  it('fails with an IO error at end of input', async () => {
    const { prompter, input } = readlinePrompter();
    input.end('1\n');

    await expect(prompter.ask(2)).resolves.toBe('1');
    await expect(prompter.ask(2)).rejects.toMatchObject({ code: ErrorCode.IO_ERROR });

    prompter.close();
  });

  it('can be closed before it is used', () => {
    const { prompter } = readlinePrompter();

    expect(() => prompter.close()).not.toThrow();
  });
});

describe('InquirerPrompter', () => {
  afterEach(() => {
    mockPrompt.mockReset();
  });

  it('asks through inquirer and returns the answer', async () => {
    mockPrompt.mockResolvedValueOnce({ choice: '2' });

    const prompter = new InquirerPrompter();
    const answer = await prompter.ask(5);

    expect(answer).toBe('2');
    expect(mockPrompt).toHaveBeenCalledWith([
      { type: 'input', name: 'choice', message: 'Choose subtitle [1-5], q to quit:' },
    ]);
  });
});
