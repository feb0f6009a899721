/**
 * @rewardstream/distributor — Proportional reward distribution:
 * reward token registry, silo, harvest, claims, recipient redirects.
 */

// Coordinator
export { RewardDistributor } from "./distributor.js";

// Components
export { RewardTokenRegistry } from "./registry.js";
export { RewardSilo } from "./silo.js";
export { RecipientDirectory } from "./recipients.js";
export type { RecipientScope } from "./recipients.js";
export { AccessControl } from "./access.js";
export { EventPublisher } from "./events.js";
export type { UnstampedEvent } from "./events.js";

// Snapshot hashing
export { computeSnapshotHash, verifySnapshotHash } from "./snapshot-hash.js";

// In-memory collaborators
export {
  MemoryBalanceLedger,
  MemoryHarvestSource,
  MemoryTokenBank,
  MemoryCodeInspector,
  createMemoryDistributor,
} from "./memory.js";
export type {
  AccrualHooks,
  Delivery,
  MemoryDistributor,
  MemoryDistributorOptions,
} from "./memory.js";

// Types
export { DistributorError } from "./types.js";
export type {
  DistributorErrorCode,
  DistributorDeps,
  EventListener,
  ListenerErrorHook,
  ClaimPayout,
  ClaimResult,
  HarvestResult,
  DistributorSnapshot,
  GlobalStateEntry,
  UserStateEntry,
  RegistryEntry,
  SiloEntry,
  RecipientEntry,
} from "./types.js";
