export type { ArtifactKind, IArtifactStore } from './artifact-store.interface.js';
export type { IClock } from './clock.interface.js';
export type { IRemoteService } from './remote-service.interface.js';
export type { ITransferClient } from './transfer-client.interface.js';
