export { createContactRecord, googleDisplayName, googlePhoneFields, type ExportRow } from './model.js';
export { detectLayout, rowToContactRecord, toContactRecords } from './schema.js';
export { parseContactExport, formatCsv, detectDelimiter } from './csv.js';
export { deriveFirstName, greetingName, DEFAULT_GREETING_FALLBACK } from './greeting.js';
export { buildChannelLists, channelListColumns, withGreeting } from './channels.js';
