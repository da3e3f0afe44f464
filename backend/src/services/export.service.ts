/**
 * Conversation export as JSON, CSV or plain text
 */

import { Parser } from 'json2csv';
import type { ChatMessage, ExportFormat } from '../types/chat.types';

export interface ExportedConversation {
  content: string;
  contentType: string;
  filename: string;
}

interface ExportRow {
  role: string;
  content: string;
  timestamp: string;
}

const EXPORT_FIELDS = ['role', 'content', 'timestamp'];

const CONTENT_TYPES: Record<ExportFormat, string> = {
  json: 'application/json',
  csv: 'text/csv',
  txt: 'text/plain'
};

/** `YYYY-MM-DD HH:mm:ss` from an ISO timestamp */
const formatTimestamp = (timestamp: string): string => timestamp.slice(0, 19).replace('T', ' ');

const toRows = (messages: ChatMessage[]): ExportRow[] =>
  messages.map(({ role, content, timestamp }) => ({ role, content, timestamp }));

export function exportConversation(
  sessionId: string,
  messages: ChatMessage[],
  format: ExportFormat
): ExportedConversation {
  const rows = toRows(messages);
  let content: string;

  switch (format) {
    case 'json':
      content = JSON.stringify(rows, null, 2);
      break;
    case 'csv':
      content = new Parser<ExportRow>({ fields: EXPORT_FIELDS }).parse(rows);
      break;
    case 'txt':
      content = rows
        .map(row => `[${formatTimestamp(row.timestamp)}] ${row.role.toUpperCase()}: ${row.content}`)
        .join('\n');
      break;
  }

  return {
    content,
    contentType: CONTENT_TYPES[format],
    filename: `chat_${sessionId}.${format}`
  };
}
