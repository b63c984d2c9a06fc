const warnedMessages = new Set<string>();

export function warnOnce(message: string): void {
  if (!warnedMessages.has(message)) {
    console.warn(message);
    warnedMessages.add(message);
  }
}
