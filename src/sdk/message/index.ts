export { Msg, ROLES, isRole } from './msg.js';
export type { Role, MsgContent, MsgDict, MsgOptions } from './msg.js';
export * from './content-blocks.js';
