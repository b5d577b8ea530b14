export * from './types';
export * from './time';
export * from './intervals';
export * from './slotFinder';
export * from './conflictResolver';
export * from './staggeredSlots';
export * from './reprioritize';
