import { ChatMessage } from '../core/entities/Marketplace.js';
import { parseMarketTimestamp, subMillisecondDigits } from './timestamps.js';

function compareText(left: string, right: string): number {
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

function compareTimestamps(a: ChatMessage['timestamp'], b: ChatMessage['timestamp']): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  const left = String(a);
  const right = String(b);
  if (typeof a === 'string' && typeof b === 'string') {
    const leftMs = parseMarketTimestamp(left);
    const rightMs = parseMarketTimestamp(right);
    if (!Number.isNaN(leftMs) && !Number.isNaN(rightMs)) {
      if (leftMs !== rightMs) return leftMs - rightMs;
      const width = Math.max(left.length, right.length);
      return compareText(subMillisecondDigits(left, width), subMillisecondDigits(right, width));
    }
  }
  return compareText(left, right);
}

/**
 * Oldest first. Array#sort is stable, so equal timestamps keep API order.
 * Unparseable timestamps fall back to text order.
 */
export function sortMessages(messages: readonly ChatMessage[]): ChatMessage[] {
  return [...messages].sort((a, b) => compareTimestamps(a.timestamp, b.timestamp));
}

/**
 * Flatten a sorted transcript into "sender: message" blocks
 */
export function formatTranscript(messages: readonly ChatMessage[]): string {
  return messages.map((message) => `${message.sender}: ${message.message}`).join('\n\n');
}
