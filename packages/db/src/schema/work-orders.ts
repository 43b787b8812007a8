import {
  pgSchema,
  varchar,
  text,
  boolean,
  integer,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';

export const shopSchema = pgSchema('shop');

// ─── Work Orders ─────────────────────────────────────────────────────
// Date columns stay as text: rows imported from the legacy system carry
// several formats (and some garbage), parsed once by the queue service.
export const workOrders = shopSchema.table(
  'work_orders',
  {
    workOrderNo: varchar('work_order_no', { length: 20 }).primaryKey(),
    custId: varchar('cust_id', { length: 20 }),
    woName: text('wo_name'),
    shipTo: text('ship_to'),
    rushOrder: boolean('rush_order').notNull().default(false),
    firmRush: boolean('firm_rush').notNull().default(false),
    dateIn: varchar('date_in', { length: 32 }),
    dateRequired: varchar('date_required', { length: 32 }),
    dateCompleted: varchar('date_completed', { length: 32 }),
    queuePosition: integer('queue_position'), // null = not yet ranked
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('wo_queue_position_idx').on(table.queuePosition),
    index('wo_date_completed_idx').on(table.dateCompleted),
    index('wo_cust_idx').on(table.custId),
  ]
);

export type WorkOrderRow = typeof workOrders.$inferSelect;
export type NewWorkOrderRow = typeof workOrders.$inferInsert;
