export * from './CursorFetchIterator';
export * from './cursorPages';
