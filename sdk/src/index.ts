/**
 * pagesync SDK
 * Page state engine, wire codec and synchronization channel client
 *
 * @packageDocumentation
 * @module @pagesync/sdk
 */

// State engine
export { apply, applyAll, replay, emptySnapshot } from './store/reducer'
export type { ApplyResult, ApplyAllResult, Rejection } from './store/reducer'
export { PageStore } from './store/store'
export type { StoreApplyResult } from './store/store'
export { validateOperation, isValidEntityId, liveEntity, liveChildren } from './store/validator'
export type { StateView } from './store/validator'
export {
  getEntity,
  getPage,
  rootIds,
  childIds,
  activeRelationships,
  traverse,
  hydrationOperations,
  snapshotToJSON,
} from './store/selectors'
export type { EntityJSON, PageSnapshotJSON } from './store/selectors'

// Wire codec
export {
  decodeMessage,
  parseMessage,
  parseOperation,
  parsePropValue,
  serializeMessage,
  frameToString,
  isOperationMessage,
  messageSchema,
  operationSchema,
  propValueSchema,
} from './websocket/protocol'
export type {
  Message,
  MessageType,
  ControlMessage,
  SnapshotStartMessage,
  SnapshotEndMessage,
  StreamStartMessage,
  StreamEndMessage,
  DirectEditMessage,
  DirectEditErrorMessage,
} from './websocket/protocol'

// Channel
export { PageSyncClient, createWebSocket } from './websocket/client'
export type {
  PageSyncClientConfig,
  ChannelState,
  ChannelEvents,
  ClientMessage,
  ClientSocket,
  SocketFactory,
  SocketHandlers,
} from './websocket/client'
export { ReconnectionManager, DEFAULT_RECONNECT_OPTIONS } from './sync/reconnect'
export type { ReconnectOptions } from './sync/reconnect'
export { PageReplica } from './replica'

// Types
export { ROOT, isStateOperation } from './types'
export type {
  Entity,
  PropValue,
  ScalarValue,
  DateValue,
  Props,
  Cardinality,
  Relationship,
  Meta,
  Annotation,
  MetaConstraint,
  RelConstraint,
  Styles,
  PageSnapshot,
  Operation,
  OperationType,
  StateOperation,
  SignalOperation,
  EntityCreateOp,
  EntityUpdateOp,
  EntityRemoveOp,
  EntityMoveOp,
  EntityReorderOp,
  RelSetOp,
  RelRemoveOp,
  MetaUpdateOp,
  StyleSetOp,
  StyleEntityOp,
  MetaAnnotateOp,
  MetaConstrainOp,
  RelConstrainOp,
  VoiceOp,
  EscalateOp,
  BatchStartOp,
  BatchEndOp,
  Unsubscribe,
} from './types'

// Errors
export {
  PageSyncError,
  ValidationError,
  ValidationErrorCode,
  TransportError,
  TransportErrorCode,
  ProtocolError,
  ProtocolErrorCode,
} from './types'

// Version
export const VERSION = '0.1.0'
