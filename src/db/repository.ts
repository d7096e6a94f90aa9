import { Pool } from 'pg';
import { LandedCostResult, ShippingMethod } from '../domain/models';
import { ValidatedSavedAddress } from '../domain/schemas';

export interface HistoryEntry {
    id: number;
    link: string;
    itemName: string;
    shippingMethod: string;
    destinationAddress: string;
    destinationZip: string;
    totalJpy: number;
    totalUsd: number;
    exchangeRate: number;
    createdAt: Date;
}

export interface HistoryStats {
    count: number;
    averageTotalUsd: number;
    byShippingMethod: Record<string, number>;
}

export interface SavedAddress {
    id: number;
    name: string | null;
    address: string;
    zipCode: string;
    useCount: number;
    lastUsed: Date;
}

export interface Destination {
    address: string;
    zip: string;
}

function toDate(value: unknown): Date {
    return value instanceof Date ? value : new Date(String(value));
}

// pg hands DECIMAL and BIGINT columns back as strings.
function toNumber(value: unknown): number {
    const n = typeof value === 'number' ? value : parseFloat(String(value));
    return Number.isFinite(n) ? n : 0;
}

function toHistoryEntry(row: Record<string, unknown>): HistoryEntry {
    return {
        id: toNumber(row.id),
        link: String(row.link),
        itemName: String(row.item_name ?? ''),
        shippingMethod: String(row.shipping_method),
        destinationAddress: String(row.destination_address ?? ''),
        destinationZip: String(row.destination_zip),
        totalJpy: toNumber(row.total_jpy),
        totalUsd: toNumber(row.total_usd),
        exchangeRate: toNumber(row.exchange_rate),
        createdAt: toDate(row.created_at),
    };
}

export class CalculationHistoryRepository {
    constructor(private pool: Pool) { }

    async save(result: LandedCostResult, destination: Destination): Promise<number> {
        const { rows } = await this.pool.query(
            `INSERT INTO calculation_history (link, item_name, shipping_method, destination_address, destination_zip, total_jpy, total_usd, exchange_rate, breakdown)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       RETURNING id`,
            [
                result.link,
                result.itemName,
                result.shippingMethod,
                destination.address,
                destination.zip,
                result.totalJpy,
                result.totalUsd,
                result.exchangeRate,
                JSON.stringify(result),
            ],
        );
        return toNumber(rows[0]?.id);
    }

    async findById(id: number): Promise<HistoryEntry | null> {
        const { rows } = await this.pool.query(
            `SELECT id, link, item_name, shipping_method, destination_address, destination_zip, total_jpy, total_usd, exchange_rate, created_at
       FROM calculation_history
       WHERE id = $1`,
            [id],
        );
        return rows.length > 0 ? toHistoryEntry(rows[0]) : null;
    }

    async findRecent(limit: number = 20): Promise<HistoryEntry[]> {
        const { rows } = await this.pool.query(
            `SELECT id, link, item_name, shipping_method, destination_address, destination_zip, total_jpy, total_usd, exchange_rate, created_at
       FROM calculation_history
       ORDER BY created_at DESC
       LIMIT $1`,
            [limit],
        );
        return rows.map(toHistoryEntry);
    }

    async getStats(): Promise<HistoryStats> {
        const totals = await this.pool.query(
            `SELECT COUNT(*) AS count, COALESCE(AVG(total_usd), 0) AS avg_usd
       FROM calculation_history`,
        );
        const methods = await this.pool.query(
            `SELECT shipping_method, COUNT(*) AS count
       FROM calculation_history
       GROUP BY shipping_method`,
        );

        const byShippingMethod: Record<string, number> = {};
        for (const method of Object.values(ShippingMethod)) byShippingMethod[method] = 0;
        for (const row of methods.rows) {
            byShippingMethod[String(row.shipping_method)] = toNumber(row.count);
        }

        return {
            count: toNumber(totals.rows[0]?.count),
            averageTotalUsd: Math.round(toNumber(totals.rows[0]?.avg_usd) * 100) / 100,
            byShippingMethod,
        };
    }
}

export class SavedAddressRepository {
    constructor(private pool: Pool) { }

    // Saving a known address again bumps its use count; a blank name keeps the old one.
    async upsert(input: ValidatedSavedAddress): Promise<SavedAddress> {
        const { rows } = await this.pool.query(
            `INSERT INTO saved_addresses (name, address, zip_code)
       VALUES ($1, $2, $3)
       ON CONFLICT (address, zip_code)
       DO UPDATE SET name = COALESCE(EXCLUDED.name, saved_addresses.name),
                     use_count = saved_addresses.use_count + 1,
                     last_used = NOW()
       RETURNING id, name, address, zip_code, use_count, last_used`,
            [input.name || null, input.address, input.zipCode],
        );
        return this.toSavedAddress(rows[0]);
    }

    async list(): Promise<SavedAddress[]> {
        const { rows } = await this.pool.query(
            `SELECT id, name, address, zip_code, use_count, last_used
       FROM saved_addresses
       ORDER BY last_used DESC`,
        );
        return rows.map(row => this.toSavedAddress(row));
    }

    async delete(id: number): Promise<boolean> {
        const result = await this.pool.query('DELETE FROM saved_addresses WHERE id = $1', [id]);
        return (result.rowCount ?? 0) > 0;
    }

    private toSavedAddress(row: Record<string, unknown>): SavedAddress {
        return {
            id: toNumber(row.id),
            name: typeof row.name === 'string' ? row.name : null,
            address: String(row.address),
            zipCode: String(row.zip_code),
            useCount: toNumber(row.use_count),
            lastUsed: toDate(row.last_used),
        };
    }
}
