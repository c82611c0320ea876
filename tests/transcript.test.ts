import { formatTranscript, sortMessages } from '../src/utils/transcript.js';
import { ChatMessage } from '../src/core/entities/Marketplace.js';

describe('sortMessages', () => {
  it('should order messages by timestamp ascending', () => {
    const messages: ChatMessage[] = [
      { sender: 'c', message: 'third', timestamp: 3 },
      { sender: 'a', message: 'first', timestamp: 1 },
      { sender: 'b', message: 'second', timestamp: 2 },
    ];

    expect(sortMessages(messages).map((m) => m.sender)).toEqual(['a', 'b', 'c']);
  });

  it('should order ISO timestamps', () => {
    const messages: ChatMessage[] = [
      { sender: 'late', message: 'x', timestamp: '2024-05-01T10:00:05' },
      { sender: 'early', message: 'y', timestamp: '2024-05-01T09:59:59' },
    ];

    expect(sortMessages(messages).map((m) => m.sender)).toEqual(['early', 'late']);
  });

  it('should order ISO timestamps by instant across fractional precisions', () => {
    const messages: ChatMessage[] = [
      { sender: 'second', message: 'x', timestamp: '2024-06-01T10:00:00.500000Z' },
      { sender: 'first', message: 'y', timestamp: '2024-06-01T10:00:00Z' },
    ];

    expect(sortMessages(messages).map((m) => m.sender)).toEqual(['first', 'second']);
  });

  it('should order microseconds within the same millisecond', () => {
    const messages: ChatMessage[] = [
      { sender: 'later', message: 'x', timestamp: '2024-06-01T10:00:00.500900' },
      { sender: 'earlier', message: 'y', timestamp: '2024-06-01T10:00:00.5001' },
    ];

    expect(sortMessages(messages).map((m) => m.sender)).toEqual(['earlier', 'later']);
  });

  it('should fall back to text order for unparseable timestamps', () => {
    const messages: ChatMessage[] = [
      { sender: 'b', message: 'x', timestamp: 'step-b' },
      { sender: 'a', message: 'y', timestamp: 'step-a' },
    ];

    expect(sortMessages(messages).map((m) => m.sender)).toEqual(['a', 'b']);
  });

  it('should keep input order for equal timestamps', () => {
    const messages: ChatMessage[] = [
      { sender: 'first', message: 'x', timestamp: 5 },
      { sender: 'second', message: 'y', timestamp: 5 },
      { sender: 'zero', message: 'z', timestamp: 1 },
    ];

    expect(sortMessages(messages).map((m) => m.sender)).toEqual(['zero', 'first', 'second']);
  });

  it('should not mutate its input', () => {
    const messages: ChatMessage[] = [
      { sender: 'b', message: 'x', timestamp: 2 },
      { sender: 'a', message: 'y', timestamp: 1 },
    ];
    sortMessages(messages);
    expect(messages[0].sender).toBe('b');
  });
});

describe('formatTranscript', () => {
  it('should join "sender: message" blocks with blank lines', () => {
    const transcript = formatTranscript([
      { sender: 'requester', message: 'Please fix it', timestamp: 1 },
      { sender: 'provider', message: 'Done', timestamp: 2 },
    ]);

    expect(transcript).toBe('requester: Please fix it\n\nprovider: Done');
  });

  it('should reflect sorted order for timestamps [3, 1, 2]', () => {
    const transcript = formatTranscript(
      sortMessages([
        { sender: 's3', message: 'c', timestamp: 3 },
        { sender: 's1', message: 'a', timestamp: 1 },
        { sender: 's2', message: 'b', timestamp: 2 },
      ])
    );

    expect(transcript).toBe('s1: a\n\ns2: b\n\ns3: c');
  });
});
