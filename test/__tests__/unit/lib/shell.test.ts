/**
 * Unit Tests: Shell rendering
 */

import { quoteShellWord, renderInvocation, renderInvocations } from '../../../../src/lib/shell';

describe('quoteShellWord', () => {
  it.each([
    ['ffmpeg', 'ffmpeg'],
    ['youtube_transcript_api==0.6.0', 'youtube_transcript_api==0.6.0'],
    ['/usr/share/zoneinfo/US/Pacific', '/usr/share/zoneinfo/US/Pacific'],
    ['', "''"],
    ['two words', "'two words'"],
    ['$HOME', "'$HOME'"],
    ["it's", "'it'\\''s'"],
    ['autogen-ext[openai]', "'autogen-ext[openai]'"],
  ])('%j -> %s', (word, expected) => {
    expect(quoteShellWord(word)).toBe(expected);
  });
});

describe('renderInvocation', () => {
  it('should prefix environment assignments', () => {
    expect(
      renderInvocation({
        command: 'apt-get',
        args: ['install', '-y', 'ffmpeg'],
        expectedExitCode: 0,
        env: { DEBIAN_FRONTEND: 'noninteractive' },
      }),
    ).toBe('DEBIAN_FRONTEND=noninteractive apt-get install -y ffmpeg');
  });

  it('should redirect standard output', () => {
    expect(
      renderInvocation({ command: 'echo', args: ['US/Pacific'], expectedExitCode: 0, stdoutTo: '/etc/timezone' }),
    ).toBe('echo US/Pacific > /etc/timezone');
  });
});

describe('renderInvocations', () => {
  it('should chain invocations so the first failure stops the line', () => {
    expect(
      renderInvocations([
        { command: 'apt-get', args: ['update'], expectedExitCode: 0 },
        { command: 'grep', args: ['-q', 'x', '/etc/hosts'], expectedExitCode: 1 },
      ]),
    ).toBe('apt-get update && { grep -q x /etc/hosts; test $? -eq 1; }');
  });
});
