/**
 * Upload Service
 * Stores uploaded data files and profiles the tabular ones for analysis
 */

import fs from 'fs';
import path from 'path';
import * as ExcelJS from 'exceljs';
import multer from 'multer';
import { v4 as uuidv4 } from 'uuid';
import { env } from '../config/env';
import { createComponentLogger } from '../config/logger';
import { ApiError } from '../middleware/error-handler';
import { normalizeRow } from './bigquery.service';
import type { CellValue, Row } from '../types/agent.types';
import type { UploadedFile } from '../types/chat.types';

const logger = createComponentLogger('upload-service');

export const ALLOWED_EXTENSIONS = ['.csv', '.json', '.xlsx', '.txt', '.parquet'];

const SAMPLE_ROWS = 5;

export interface FileProfile {
  columns: string[];
  rowCount: number;
  sampleRows: Row[];
  rows: Row[];
}

function toCellValue(value: ExcelJS.CellValue): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if ('result' in value && value.result !== undefined) {
    return toCellValue(value.result);
  }
  if ('text' in value && typeof value.text === 'string') {
    return value.text;
  }
  return JSON.stringify(value);
}

function worksheetRows(worksheet: ExcelJS.Worksheet): Row[] {
  const columns: string[] = [];
  worksheet.getRow(1).eachCell({ includeEmpty: true }, (cell, columnNumber) => {
    columns[columnNumber - 1] = cell.text || `column_${columnNumber}`;
  });

  const rows: Row[] = [];
  worksheet.eachRow((row, rowNumber) => {
    if (rowNumber === 1) {
      return;
    }
    const record: Row = {};
    columns.forEach((column, index) => {
      record[column] = toCellValue(row.getCell(index + 1).value);
    });
    rows.push(record);
  });
  return rows;
}

function jsonRows(text: string): Row[] {
  const parsed: unknown = JSON.parse(text);
  const records = Array.isArray(parsed) ? parsed : [parsed];
  return records.filter(record => record !== null && typeof record === 'object').map(normalizeRow);
}

export class UploadService {
  constructor(
    private readonly uploadDir: string = env.UPLOAD_DIR,
    private readonly maxBytes: number = env.MAX_UPLOAD_BYTES
  ) {}

  /**
   * Multer middleware holding the single `file` field in memory
   */
  middleware() {
    return multer({
      storage: multer.memoryStorage(),
      limits: { fileSize: this.maxBytes }
    }).single('file');
  }

  /**
   * Write an upload as `<uuid>_<name>` after checking its extension
   */
  async save(originalName: string, contents: Buffer): Promise<UploadedFile> {
    const filename = path.basename(originalName);
    const fileType = path.extname(filename).toLowerCase();

    if (!ALLOWED_EXTENSIONS.includes(fileType)) {
      throw new ApiError(
        400,
        `File type ${fileType || '(none)'} not allowed. Allowed types: ${ALLOWED_EXTENSIONS.join(', ')}`,
        'INVALID_FILE_TYPE'
      );
    }
    if (contents.length > this.maxBytes) {
      throw new ApiError(400, 'File too large', 'FILE_TOO_LARGE');
    }

    const fileId = uuidv4();
    const filePath = path.join(this.uploadDir, `${fileId}_${filename}`);
    await fs.promises.mkdir(this.uploadDir, { recursive: true });
    await fs.promises.writeFile(filePath, contents);

    logger.info('File uploaded', { fileId, filename, size: contents.length });
    return { fileId, filename, size: contents.length, fileType, path: filePath };
  }

  /**
   * Columns, row count and sample rows; null for formats that are not profiled
   */
  async profile(file: UploadedFile): Promise<FileProfile | null> {
    let rows: Row[] | null;
    try {
      rows = await this.readRows(file);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn('Could not parse upload', { fileId: file.fileId, reason });
      throw new ApiError(400, `Could not parse ${file.filename}: ${reason}`, 'INVALID_FILE');
    }
    if (!rows) {
      return null;
    }

    return {
      columns: rows.length > 0 ? Object.keys(rows[0]) : [],
      rowCount: rows.length,
      sampleRows: rows.slice(0, SAMPLE_ROWS),
      rows
    };
  }

  private async readRows(file: UploadedFile): Promise<Row[] | null> {
    switch (file.fileType) {
      case '.csv': {
        const workbook = new ExcelJS.Workbook();
        return worksheetRows(await workbook.csv.readFile(file.path));
      }
      case '.xlsx': {
        const workbook = new ExcelJS.Workbook();
        await workbook.xlsx.readFile(file.path);
        const worksheet = workbook.worksheets[0];
        return worksheet ? worksheetRows(worksheet) : [];
      }
      case '.json':
        return jsonRows(await fs.promises.readFile(file.path, 'utf8'));
      default:
        return null;
    }
  }

  async remove(file: UploadedFile): Promise<void> {
    await fs.promises.rm(file.path, { force: true });
    logger.info('Upload removed', { fileId: file.fileId });
  }

  getFileInfo(fileId: string): UploadedFile | null {
    if (!fs.existsSync(this.uploadDir)) {
      return null;
    }

    const stored = fs.readdirSync(this.uploadDir).find(name => name.startsWith(`${fileId}_`));
    if (!stored) {
      return null;
    }

    const filePath = path.join(this.uploadDir, stored);
    const filename = stored.slice(fileId.length + 1);
    return {
      fileId,
      filename,
      size: fs.statSync(filePath).size,
      fileType: path.extname(filename).toLowerCase(),
      path: filePath
    };
  }
}

/**
 * Prompt asking the agents to analyse an uploaded file
 */
export function buildAnalysisPrompt(file: UploadedFile, profile: FileProfile | null): string {
  let prompt = `I've uploaded a ${file.fileType} file named '${file.filename}' (${file.size} bytes).
Please analyze this dataset and provide insights including:
1. Data structure and quality assessment
2. Key statistics and patterns
3. Recommended analyses and visualizations
4. Data cleaning suggestions if needed
5. Potential machine learning opportunities`;

  if (profile) {
    prompt += `\n\nColumns: ${profile.columns.join(', ')}\nRow count: ${profile.rowCount}\nSample rows: ${JSON.stringify(profile.sampleRows)}`;
  }
  return prompt;
}
