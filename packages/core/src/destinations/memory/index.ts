export { MemoryAccessGroupDestination, MemoryContactsDestination } from './memory_destination';
export type { MemoryDestinationOptions, MemoryMutation } from './memory_destination';
