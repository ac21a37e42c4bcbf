export type {
  Link,
  LinkChanges,
  LinkSort,
  LinkSortField,
  LinkStats
} from "./domain/models/link";
export type { LegacyLinkRecord, LinkRecord } from "./domain/models/link-record";
export type {
  LinkChangeEvent,
  LinkChangeType,
  LinkObserver
} from "./domain/models/link-change";
export type {
  BrowserOpener,
  Clock,
  IdGenerator,
  RandomSource
} from "./domain/models/collaborators";
export {
  NotFoundError,
  StorageError,
  ValidationError,
  isLinkError,
  type LinkError,
  type LinkErrorKind,
  type ValidationField
} from "./domain/models/link-errors";
export {
  DEFAULT_BACKUP_SUFFIX,
  LINK_BACKUP_SUFFIX_ENV,
  LINK_DATA_FILE_ENV,
  type LinkStorageSettings
} from "./domain/models/link-settings";
export {
  backupPathFor,
  defaultLinkStorageSettings,
  resolveLinkStorageSettings
} from "./domain/services/link-settings";
export {
  applyLinkChanges,
  cloneLink,
  createLink,
  deriveLinkName,
  isSameLink,
  isValidLinkUrl,
  linkHasTag,
  markLinkOpened,
  normalizeLinkName,
  normalizeLinkUrl,
  normalizeTag,
  toggleLinkFavorite,
  toggleLinkRead,
  type NewLinkInput
} from "./domain/services/link-validation";
export {
  InMemoryLinkRepository,
  JsonFileLinkRepository,
  createJsonLinkRepository,
  nodeLinkFileSystem,
  type JsonFileLinkRepositoryOptions,
  type LinkFileSystem,
  type LinkRepository
} from "./domain/services/link-repository";
export {
  computeLinkStats,
  countTagUsage,
  filterLinksByTags,
  listTags,
  pickRandomLink,
  searchLinks,
  sortLinks
} from "./domain/services/link-query";
export {
  LinkService,
  openLinkService,
  type AddLinksFailure,
  type AddLinksResult,
  type DeleteLinksResult,
  type LinkBatchResult,
  type LinkServiceDependencies,
  type OpenLinkFailure,
  type OpenLinksResult
} from "./domain/services/link-service";
export { parseLinkLines, type LinkBatchEntry } from "./domain/services/link-import";
export {
  createSystemBrowserOpener,
  resolveLaunchCommand,
  type CommandRunner,
  type LaunchCommand,
  type SystemBrowserOpenerOptions
} from "./domain/services/browser-opener";
export { extractLinkDomain, formatLinkTimestamp } from "./domain/services/link-display";
