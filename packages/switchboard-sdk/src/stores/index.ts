/**
 * Direct store access for hosts that render without the React hooks.
 *
 * Stores are created per client; reach them through `client.stores`.
 *
 * @packageDocumentation
 * @module Stores
 */

export { createActivityStore, type ActivityState, type ActivityStore } from './activityStore'
export { createDirectoryStore, type DirectoryState, type DirectoryStore } from './directoryStore'
export {
  directorySelectors,
  unreadCountForDispatcher,
  dispatchersWithComposingSessions,
} from './directorySelectors'
