/**
 * Section exports
 *
 * Reads one section's records in a date range (oldest first) and writes
 * them to a single-sheet xlsx workbook. Read-only.
 */

import ExcelJS from 'exceljs';
import {
    isEmptyRange,
    rangeLabel,
    type Customer,
    type DateRange,
    type EntryType,
    type ExportSection,
    type LedgerEntry,
    type OrderWithCustomer,
    type TaskStatus,
    type TaskWithCustomer,
} from '@storekeep/shared';
import type { KyselyDB } from '../../db/index.js';
import {
    listCustomersKysely,
    listLedgerEntriesKysely,
    listOrdersKysely,
    listTasksKysely,
} from '../../db/queries/index.js';
import { exportLogger } from '../../utils/logger.js';

export const EXPORT_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

// ============================================
// TYPES
// ============================================

export type ExportRequest =
    | { section: 'customers'; range: DateRange }
    | { section: 'orders'; range: DateRange }
    | { section: 'expenses'; range: DateRange; type?: EntryType }
    | { section: 'tasks'; range: DateRange; status?: TaskStatus };

export interface ExportColumn<T> {
    header: string;
    width: number;
    value: (row: T) => ExcelJS.CellValue;
}

/** Header names plus one array of cell values per record */
export interface SheetData {
    sheetName: string;
    headers: string[];
    widths: number[];
    rows: ExcelJS.CellValue[][];
}

export interface ExportResult {
    filename: string;
    rowCount: number;
    buffer: Buffer;
}

// ============================================
// COLUMNS
// ============================================

export const CUSTOMER_COLUMNS: ExportColumn<Customer>[] = [
    { header: 'ID', width: 8, value: (c) => c.id },
    { header: 'Created At', width: 12, value: (c) => c.createdAt },
    { header: 'Name', width: 28, value: (c) => c.name },
    { header: 'Email', width: 28, value: (c) => c.email },
    { header: 'Phone', width: 16, value: (c) => c.phone },
    { header: 'City', width: 16, value: (c) => c.city },
    { header: 'Country', width: 16, value: (c) => c.country },
    { header: 'External Customer ID', width: 22, value: (c) => c.externalCustomerId },
    { header: 'Note', width: 40, value: (c) => c.note },
];

export const ORDER_COLUMNS: ExportColumn<OrderWithCustomer>[] = [
    { header: 'ID', width: 8, value: (o) => o.id },
    { header: 'Order Date', width: 12, value: (o) => o.orderDate },
    { header: 'Order Number', width: 18, value: (o) => o.orderNumber },
    { header: 'Customer', width: 28, value: (o) => o.customerName },
    { header: 'Total Amount', width: 14, value: (o) => o.totalAmount },
    { header: 'Currency', width: 10, value: (o) => o.currency },
    { header: 'Payment Status', width: 16, value: (o) => o.paymentStatus },
    { header: 'Fulfillment Status', width: 18, value: (o) => o.fulfillmentStatus },
    { header: 'Sales Channel', width: 16, value: (o) => o.salesChannel },
    { header: 'Note', width: 40, value: (o) => o.note },
];

export const LEDGER_COLUMNS: ExportColumn<LedgerEntry>[] = [
    { header: 'ID', width: 8, value: (e) => e.id },
    { header: 'Date', width: 12, value: (e) => e.date },
    { header: 'Type', width: 10, value: (e) => e.type },
    { header: 'Category', width: 18, value: (e) => e.category },
    { header: 'Description', width: 40, value: (e) => e.description },
    { header: 'Amount', width: 14, value: (e) => e.amount },
];

export const TASK_COLUMNS: ExportColumn<TaskWithCustomer>[] = [
    { header: 'ID', width: 8, value: (t) => t.id },
    { header: 'Date', width: 12, value: (t) => t.date },
    { header: 'Title', width: 32, value: (t) => t.title },
    { header: 'Customer', width: 28, value: (t) => t.customerName },
    { header: 'Status', width: 14, value: (t) => t.status },
    { header: 'Priority', width: 10, value: (t) => t.priority },
    { header: 'Note', width: 40, value: (t) => t.note },
];

// ============================================
// SHEET BUILDING
// ============================================

export function toSheetData<T>(sheetName: string, columns: ExportColumn<T>[], records: readonly T[]): SheetData {
    return {
        sheetName,
        headers: columns.map((col) => col.header),
        widths: columns.map((col) => col.width),
        rows: records.map((record) => columns.map((col) => col.value(record))),
    };
}

/**
 * One worksheet with a bold header row; the header is written even when
 * there are no records.
 */
export function buildWorkbook(sheet: SheetData): ExcelJS.Workbook {
    const workbook = new ExcelJS.Workbook();
    workbook.created = new Date();

    const worksheet = workbook.addWorksheet(sheet.sheetName);
    worksheet.columns = sheet.headers.map((header, index) => ({ header, width: sheet.widths[index] }));
    worksheet.getRow(1).font = { bold: true };
    worksheet.addRows(sheet.rows);

    return workbook;
}

export function exportFilename(section: ExportSection, range: DateRange): string {
    return `${section}_${rangeLabel(range)}.xlsx`;
}

/**
 * Read the rows for one export request, ordered by date then id ascending
 */
export async function loadSheetData(db: KyselyDB, request: ExportRequest): Promise<SheetData> {
    const { startDate, endDate } = request.range;
    const base = { startDate, endDate, sort: 'asc' as const };

    switch (request.section) {
        case 'customers':
            return toSheetData('Customers', CUSTOMER_COLUMNS, await listCustomersKysely(db, base));
        case 'orders':
            return toSheetData('Orders', ORDER_COLUMNS, await listOrdersKysely(db, base));
        case 'expenses':
            return toSheetData('Expenses', LEDGER_COLUMNS, await listLedgerEntriesKysely(db, { ...base, type: request.type }));
        case 'tasks':
            return toSheetData('Tasks', TASK_COLUMNS, await listTasksKysely(db, { ...base, status: request.status }));
    }
}

export async function exportSection(db: KyselyDB, request: ExportRequest): Promise<ExportResult> {
    if (isEmptyRange(request.range)) {
        exportLogger.debug({ section: request.section, range: request.range }, 'Start date after end date, exporting header only');
    }

    const sheet = await loadSheetData(db, request);
    const workbook = buildWorkbook(sheet);
    const buffer = Buffer.from(await workbook.xlsx.writeBuffer());

    exportLogger.info({ section: request.section, rows: sheet.rows.length }, 'Export generated');

    return {
        filename: exportFilename(request.section, request.range),
        rowCount: sheet.rows.length,
        buffer,
    };
}
