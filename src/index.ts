export {
  Command,
  computeChecksum,
  encodeFrame,
  extractFrame,
  normalizeFrameHex,
  parseFrames,
  parseHex,
  toHex,
} from './protocol/framing.js';
export type { ExtractResult, Frame, RejectedBytes } from './protocol/framing.js';
export { ACK_FRAME, AckManager } from './protocol/ack.js';
export { StandardCommand, decodeStandardMessage } from './protocol/standard-message.js';
export type { StandardMessage } from './protocol/standard-message.js';
export { decodeB0, decodeB0Body, decodeB0Structure, toMessageList } from './b0/decoder.js';
export type { B0DecodeResult } from './b0/decoder.js';
export { parseB0Structure } from './b0/structure.js';
export { PagingReassembler } from './b0/paging.js';
export type { PagingAnomaly } from './b0/paging.js';
export { lookupSetting } from './b0/tables.js';
export { B0MessageType, B0SubCommand } from './b0/types.js';
export type { B0Structure, B0SubMessage, DecodedValue, SettingInfo } from './b0/types.js';
export { FrameDispatcher } from './dispatcher.js';
export type { DecodedMessage, Direction, PageEvent } from './dispatcher.js';
export { ConnectionManager, createSessionOwner } from './connection/manager.js';
export { PanelSession } from './connection/session.js';
export { ProxyOwner, StandaloneOwner } from './connection/owners.js';
export type { SessionOwner, UpstreamConnector } from './connection/owners.js';
export { ConnectionState } from './connection/types.js';
export type { RunMode, SocketLike } from './connection/types.js';
export { InjectorServer } from './injector/server.js';
export type { InjectionTarget, Injection } from './injector/server.js';
export { MessageCounter, buildB0Request, parseInjectorLine } from './injector/commands.js';
export { OfflineDecoder, decodeHexMessage } from './offline.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
