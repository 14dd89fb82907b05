/**
 * Roster sources
 *
 * Each source turns its rows into technician records using the same field
 * names the assignment request accepts, so roster technicians go through the
 * exact same validation as technicians sent inline.
 */

import { parse } from 'csv-parse/sync';
import * as fs from 'fs';
import type { AppConfig, RosterSourceKind } from '../config';
import { getRosterClient } from '../supabaseRoster';

export interface TechnicianRecord {
  technician_id: string;
  name?: string;
  phone?: string;
  area?: string;
  home_address?: string;
  home_lat?: number;
  home_lng?: number;
  service_types: string[];
  overtime_allowed: boolean;
  priority?: number;
}

export interface RosterSource {
  readonly kind: RosterSourceKind;
  load(): Promise<TechnicianRecord[]>;
}

type Row = Record<string, unknown>;

/**
 * One select over the roster table; the Supabase query builder satisfies it
 */
export type RosterRowFetcher = (
  table: string
) => PromiseLike<{ data: unknown[] | null; error: { message: string } | null }>;

const TRUTHY = ['true', '1', 'on', 'yes', 'y'];

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
}

function optionalNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  const raw = text(value);
  if (!raw) return undefined;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function splitServiceTypes(value: unknown): string[] {
  const items = Array.isArray(value) ? value : text(value).split(',');
  const types: string[] = [];
  for (const item of items) {
    const trimmed = text(item);
    if (trimmed && !types.includes(trimmed)) types.push(trimmed);
  }
  return types;
}

/**
 * Sheet-style overtime flag. Empty means allowed.
 */
function overtimeFlag(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  const raw = text(value).toLowerCase();
  if (!raw) return true;
  return TRUTHY.includes(raw);
}

/**
 * Maps one roster row (CSV or table) to a technician record. Rows without an id are dropped.
 */
export function rowToTechnician(row: Row): TechnicianRecord | null {
  const id = text(row.id) || text(row.technician_id);
  if (!id) return null;

  const record: TechnicianRecord = {
    technician_id: id,
    service_types: splitServiceTypes(row.service_types),
    overtime_allowed: overtimeFlag(row.overtime_allowed),
  };

  const name = text(row.name);
  const phone = text(row.phone);
  const area = text(row.area);
  if (name) record.name = name;
  if (phone) record.phone = phone;
  if (area) record.area = area;

  // The area doubles as a home address when none is given
  const homeAddress = text(row.home_address) || area;
  if (homeAddress) record.home_address = homeAddress;

  const homeLat = optionalNumber(row.home_lat);
  const homeLng = optionalNumber(row.home_lng);
  if (homeLat !== undefined && homeLng !== undefined) {
    record.home_lat = homeLat;
    record.home_lng = homeLng;
  }

  const priority = optionalNumber(row.priority);
  if (priority !== undefined) record.priority = priority;

  return record;
}

/**
 * Parses an exported roster sheet. Header names are matched case-insensitively.
 */
export function parseRosterCsv(content: string): TechnicianRecord[] {
  const records: unknown = parse(content, {
    columns: (header: string[]) => header.map(column => column.trim().toLowerCase()),
    skip_empty_lines: true,
    trim: true,
    bom: true,
  });

  if (!Array.isArray(records)) return [];

  const technicians: TechnicianRecord[] = [];
  for (const row of records) {
    if (!isRow(row)) continue;
    const technician = rowToTechnician(row);
    if (technician) technicians.push(technician);
  }
  return technicians;
}

export class CsvRosterSource implements RosterSource {
  readonly kind = 'csv' as const;

  constructor(private readonly location: { url?: string; path?: string }) {
    if (!location.url && !location.path) {
      throw new Error('ROSTER_CSV_URL or ROSTER_CSV_PATH is required for the csv roster source');
    }
  }

  async load(): Promise<TechnicianRecord[]> {
    return parseRosterCsv(await this.readContent());
  }

  private async readContent(): Promise<string> {
    if (this.location.url) {
      const response = await fetch(this.location.url);
      if (!response.ok) {
        throw new Error(`Roster CSV download failed: HTTP ${response.status}`);
      }
      return response.text();
    }

    if (this.location.path) {
      return fs.promises.readFile(this.location.path, 'utf-8');
    }

    throw new Error('No roster CSV location configured');
  }
}

export class SupabaseRosterSource implements RosterSource {
  readonly kind = 'supabase' as const;

  constructor(
    private readonly fetchRows: RosterRowFetcher,
    private readonly table: string = 'technicians'
  ) {}

  async load(): Promise<TechnicianRecord[]> {
    const { data, error } = await this.fetchRows(this.table);

    if (error) {
      throw new Error(`Failed to load technicians from ${this.table}: ${error.message}`);
    }

    const rows: unknown[] = data ?? [];
    const technicians: TechnicianRecord[] = [];
    for (const row of rows) {
      if (!isRow(row) || row.active === false) continue;
      const technician = rowToTechnician(row);
      if (technician) technicians.push(technician);
    }
    return technicians;
  }
}

/**
 * No roster: every request must carry its own technicians
 */
export class EmptyRosterSource implements RosterSource {
  readonly kind = 'none' as const;

  async load(): Promise<TechnicianRecord[]> {
    return [];
  }
}

export function createRosterSource(appConfig: AppConfig): RosterSource {
  switch (appConfig.rosterSource) {
    case 'csv':
      return new CsvRosterSource({
        url: appConfig.rosterCsvUrl || undefined,
        path: appConfig.rosterCsvPath || undefined,
      });
    case 'supabase':
      return new SupabaseRosterSource(
        table => getRosterClient(appConfig).from(table).select('*'),
        appConfig.rosterTable
      );
    default:
      return new EmptyRosterSource();
  }
}
