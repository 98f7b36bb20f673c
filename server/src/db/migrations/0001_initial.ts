/**
 * Initial schema: ledger, employees, reference catalog, stocked items,
 * stock movements.
 *
 * Natural keys are enforced with unique indexes so catalog and variant
 * upserts can treat a conflict as "found".
 */

import { sql, type Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
    // ----------------------------------------
    // Employees & ledger
    // ----------------------------------------
    await db.schema
        .createTable('employees')
        .addColumn('id', 'serial', (col) => col.primaryKey())
        .addColumn('full_name', 'varchar(120)', (col) => col.notNull())
        .addColumn('father_name', 'varchar(120)')
        .addColumn('cnic', 'varchar(32)')
        .addColumn('mobile_number', 'varchar(32)')
        .addColumn('address', 'text')
        .addColumn('emergency_contact', 'varchar(64)')
        .addColumn('joining_date', 'date', (col) => col.notNull())
        .addColumn('status', 'varchar(16)', (col) => col.notNull().defaultTo('active'))
        .addColumn('category', 'varchar(64)', (col) => col.notNull())
        .addColumn('work_type', 'varchar(16)', (col) => col.notNull())
        .addColumn('role_description', 'text')
        .addColumn('payment_rate', 'integer')
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .execute();

    await db.schema
        .createTable('weekly_assignments')
        .addColumn('id', 'serial', (col) => col.primaryKey())
        .addColumn('employee_id', 'integer', (col) => col.notNull().references('employees.id'))
        .addColumn('week_start', 'date', (col) => col.notNull())
        .addColumn('week_end', 'date', (col) => col.notNull())
        .addColumn('description', 'text', (col) => col.notNull())
        .addColumn('quantity', 'integer')
        .addColumn('status', 'varchar(16)', (col) => col.notNull().defaultTo('pending'))
        .addColumn('is_locked', 'boolean', (col) => col.notNull().defaultTo(false))
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .execute();

    await db.schema
        .createTable('transactions')
        .addColumn('id', 'serial', (col) => col.primaryKey())
        .addColumn('type', 'varchar(10)', (col) => col.notNull())
        .addColumn('date', 'date', (col) => col.notNull())
        .addColumn('amount', 'integer', (col) => col.notNull())
        .addColumn('category', 'varchar(64)', (col) => col.notNull())
        .addColumn('name', 'varchar(120)')
        .addColumn('bill_no', 'varchar(64)')
        .addColumn('notes', 'text')
        .addColumn('employee_id', 'integer', (col) => col.references('employees.id'))
        .addColumn('employee_tx_type', 'varchar(16)')
        .addColumn('payment_method', 'varchar(32)')
        .addColumn('assignment_id', 'integer', (col) => col.references('weekly_assignments.id'))
        .addColumn('reference', 'varchar(120)')
        .addColumn('is_deleted', 'boolean', (col) => col.notNull().defaultTo(false))
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addCheckConstraint('transactions_type_check', sql`type in ('incoming', 'outgoing')`)
        .addCheckConstraint('transactions_amount_check', sql`amount > 0`)
        .execute();

    await db.schema.createIndex('transactions_date_id_idx').on('transactions').columns(['date', 'id']).execute();
    await db.schema.createIndex('transactions_employee_id_idx').on('transactions').column('employee_id').execute();
    await sql`create index transactions_lower_name_idx on transactions (lower(trim(name)))`.execute(db);
    await db.schema
        .createIndex('weekly_assignments_employee_idx')
        .on('weekly_assignments')
        .columns(['employee_id', 'week_start'])
        .execute();

    // ----------------------------------------
    // Reference catalog
    // ----------------------------------------
    await db.schema
        .createTable('inventory_categories')
        .addColumn('id', 'serial', (col) => col.primaryKey())
        .addColumn('type', 'varchar(16)', (col) => col.notNull())
        .addColumn('name', 'varchar(120)', (col) => col.notNull())
        .addColumn('parent_id', 'integer', (col) => col.references('inventory_categories.id'))
        .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(true))
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .execute();
    await sql`create unique index inventory_categories_natural_key on inventory_categories (type, coalesce(parent_id, 0), lower(name))`.execute(db);

    await db.schema
        .createTable('bed_sizes')
        .addColumn('id', 'serial', (col) => col.primaryKey())
        .addColumn('label', 'varchar(64)', (col) => col.notNull())
        .addColumn('width_in', 'integer', (col) => col.notNull())
        .addColumn('length_in', 'integer', (col) => col.notNull())
        .addColumn('width_ft_x100', 'integer')
        .addColumn('length_ft_x100', 'integer')
        .addColumn('sort_order', 'integer', (col) => col.notNull().defaultTo(0))
        .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(true))
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addUniqueConstraint('bed_sizes_dimensions_key', ['width_in', 'length_in'])
        .execute();

    await db.schema
        .createTable('foam_thicknesses')
        .addColumn('id', 'serial', (col) => col.primaryKey())
        .addColumn('inches', 'integer', (col) => col.notNull().unique())
        .addColumn('sort_order', 'integer', (col) => col.notNull().defaultTo(0))
        .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(true))
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .execute();

    await db.schema
        .createTable('foam_brands')
        .addColumn('id', 'serial', (col) => col.primaryKey())
        .addColumn('name', 'varchar(120)', (col) => col.notNull())
        .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(true))
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .execute();
    await sql`create unique index foam_brands_lower_name_key on foam_brands (lower(name))`.execute(db);

    await db.schema
        .createTable('foam_models')
        .addColumn('id', 'serial', (col) => col.primaryKey())
        .addColumn('brand_id', 'integer', (col) => col.notNull().references('foam_brands.id'))
        .addColumn('name', 'varchar(120)', (col) => col.notNull())
        .addColumn('notes', 'text')
        .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(true))
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .execute();
    await sql`create unique index foam_models_brand_name_key on foam_models (brand_id, lower(name))`.execute(db);

    // ----------------------------------------
    // Stocked items
    // ----------------------------------------
    await db.schema
        .createTable('furniture_items')
        .addColumn('id', 'serial', (col) => col.primaryKey())
        .addColumn('name', 'varchar(160)', (col) => col.notNull())
        .addColumn('sku', 'varchar(64)', (col) => col.notNull())
        .addColumn('material_type', 'varchar(64)', (col) => col.notNull().defaultTo('Wood'))
        .addColumn('color_finish', 'varchar(64)')
        .addColumn('status', 'varchar(16)', (col) => col.notNull().defaultTo('IN_STOCK'))
        .addColumn('category_id', 'integer', (col) => col.notNull().references('inventory_categories.id'))
        .addColumn('sub_category_id', 'integer', (col) => col.references('inventory_categories.id'))
        .addColumn('notes', 'text')
        .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(true))
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .execute();

    await db.schema
        .createTable('furniture_variants')
        .addColumn('id', 'serial', (col) => col.primaryKey())
        .addColumn('furniture_item_id', 'integer', (col) => col.notNull().references('furniture_items.id'))
        .addColumn('bed_size_id', 'integer', (col) => col.references('bed_sizes.id'))
        .addColumn('qty_on_hand', 'integer', (col) => col.notNull().defaultTo(0))
        .addColumn('reorder_level', 'integer', (col) => col.notNull().defaultTo(0))
        .addColumn('cost_price', 'integer', (col) => col.notNull().defaultTo(0))
        .addColumn('sale_price', 'integer', (col) => col.notNull().defaultTo(0))
        .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(true))
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .execute();
    await sql`create unique index furniture_variants_natural_key on furniture_variants (furniture_item_id, coalesce(bed_size_id, 0))`.execute(db);

    await db.schema
        .createTable('foam_variants')
        .addColumn('id', 'serial', (col) => col.primaryKey())
        .addColumn('foam_model_id', 'integer', (col) => col.notNull().references('foam_models.id'))
        .addColumn('bed_size_id', 'integer', (col) => col.notNull().references('bed_sizes.id'))
        .addColumn('thickness_id', 'integer', (col) => col.notNull().references('foam_thicknesses.id'))
        .addColumn('density_type', 'varchar(64)')
        .addColumn('qty_on_hand', 'integer', (col) => col.notNull().defaultTo(0))
        .addColumn('reorder_level', 'integer', (col) => col.notNull().defaultTo(0))
        .addColumn('purchase_cost', 'integer', (col) => col.notNull().defaultTo(0))
        .addColumn('sale_price', 'integer', (col) => col.notNull().defaultTo(0))
        .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(true))
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addUniqueConstraint('foam_variants_natural_key', ['foam_model_id', 'bed_size_id', 'thickness_id'])
        .execute();

    await db.schema
        .createTable('sofa_items')
        .addColumn('id', 'serial', (col) => col.primaryKey())
        .addColumn('name', 'varchar(160)', (col) => col.notNull())
        .addColumn('sofa_type', 'varchar(64)', (col) => col.notNull())
        .addColumn('hardware_material', 'varchar(120)')
        .addColumn('poshish_material', 'varchar(120)')
        .addColumn('seating_capacity', 'varchar(32)')
        .addColumn('qty_on_hand', 'integer', (col) => col.notNull().defaultTo(0))
        .addColumn('reorder_level', 'integer', (col) => col.notNull().defaultTo(0))
        .addColumn('cost_price', 'integer', (col) => col.notNull().defaultTo(0))
        .addColumn('sale_price', 'integer', (col) => col.notNull().defaultTo(0))
        .addColumn('notes', 'text')
        .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(true))
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .execute();

    await db.schema
        .createTable('hardware_materials')
        .addColumn('id', 'serial', (col) => col.primaryKey())
        .addColumn('name', 'varchar(160)', (col) => col.notNull())
        .addColumn('unit', 'varchar(32)', (col) => col.notNull().defaultTo('pieces'))
        .addColumn('qty_on_hand', 'integer', (col) => col.notNull().defaultTo(0))
        .addColumn('reorder_level', 'integer', (col) => col.notNull().defaultTo(0))
        .addColumn('cost_price', 'integer', (col) => col.notNull().defaultTo(0))
        .addColumn('sale_price', 'integer', (col) => col.notNull().defaultTo(0))
        .addColumn('notes', 'text')
        .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(true))
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .execute();

    await db.schema
        .createTable('poshish_materials')
        .addColumn('id', 'serial', (col) => col.primaryKey())
        .addColumn('name', 'varchar(160)', (col) => col.notNull())
        .addColumn('color', 'varchar(64)')
        .addColumn('unit', 'varchar(32)', (col) => col.notNull().defaultTo('meters'))
        .addColumn('qty_on_hand', 'integer', (col) => col.notNull().defaultTo(0))
        .addColumn('reorder_level', 'integer', (col) => col.notNull().defaultTo(0))
        .addColumn('cost_price', 'integer', (col) => col.notNull().defaultTo(0))
        .addColumn('sale_price', 'integer', (col) => col.notNull().defaultTo(0))
        .addColumn('notes', 'text')
        .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(true))
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .execute();

    // Append-only; (inventory_type, variant_id) points into one of the five stocked tables
    await db.schema
        .createTable('stock_movements')
        .addColumn('id', 'serial', (col) => col.primaryKey())
        .addColumn('inventory_type', 'varchar(32)', (col) => col.notNull())
        .addColumn('variant_id', 'integer', (col) => col.notNull())
        .addColumn('movement_type', 'varchar(32)', (col) => col.notNull())
        .addColumn('qty_change', 'integer', (col) => col.notNull())
        .addColumn('unit_cost', 'integer')
        .addColumn('reference_type', 'varchar(32)')
        .addColumn('reference_id', 'integer')
        .addColumn('notes', 'text')
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .execute();
    await db.schema
        .createIndex('stock_movements_target_idx')
        .on('stock_movements')
        .columns(['inventory_type', 'variant_id'])
        .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
    for (const table of [
        'stock_movements',
        'poshish_materials',
        'hardware_materials',
        'sofa_items',
        'foam_variants',
        'furniture_variants',
        'furniture_items',
        'foam_models',
        'foam_brands',
        'foam_thicknesses',
        'bed_sizes',
        'inventory_categories',
        'transactions',
        'weekly_assignments',
        'employees',
    ]) {
        await db.schema.dropTable(table).ifExists().execute();
    }
}
