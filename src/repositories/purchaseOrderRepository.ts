import { Pool } from 'pg';
import { normalizePoNumber, PurchaseOrder } from '../domain/invoice';
import { toMinorUnits } from '../utils/money';

export interface PurchaseOrderRepository {
  /** Looks up by normalized order number; callers may pass raw OCR text. */
  findByNumber(poNumber: string): Promise<PurchaseOrder | null>;
}

type PurchaseOrderRow = {
  po_number: string;
  total_amount: string;
  order_date: string | null;
};

export class PgPurchaseOrderRepository implements PurchaseOrderRepository {
  constructor(private readonly pool: Pool) {}

  async findByNumber(poNumber: string): Promise<PurchaseOrder | null> {
    const result = await this.pool.query<PurchaseOrderRow>(
      `SELECT po_number, total_amount::text AS total_amount, to_char(order_date, 'YYYY-MM-DD') AS order_date
       FROM purchase_orders WHERE po_number = $1`,
      [normalizePoNumber(poNumber)]
    );
    if (result.rows.length === 0) return null;

    const row = result.rows[0];
    return {
      poNumber: row.po_number,
      totalAmountMinor: toMinorUnits(row.total_amount),
      orderDate: row.order_date,
    };
  }
}
