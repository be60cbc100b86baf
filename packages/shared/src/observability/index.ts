export * from './jsonl-event-writer';
