export { openSession, closeSession, withSession } from './setup.js';
export type { Session, OpenOptions } from './setup.js';
export { formatMatches, formatCapabilities, formatConversationList, redactConfig, truncate } from './output/formatter.js';
