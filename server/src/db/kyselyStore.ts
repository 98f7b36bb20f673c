/**
 * Kysely-backed Store
 *
 * Wraps a Kysely instance (or an open transaction) in the repository set
 * services use. `transaction(fn)` opens a database transaction and hands
 * `fn` a store bound to it; inside a transaction it simply reuses it.
 */

import type {
    HardwareMaterial,
    PoshishMaterial,
    SofaItem,
} from '@workshop-ledger/shared';
import type { KyselyDB } from './kysely.js';
import type {
    AssignmentRepository,
    CatalogRepository,
    EmployeeRepository,
    FoamRepository,
    FurnitureRepository,
    NewHardwareMaterial,
    NewPoshishMaterial,
    NewSofaItem,
    StockRepository,
    StockedItemRepository,
    Store,
    TransactionRepository,
} from './store.js';
import { KyselyCatalogRepository } from './repositories/catalog.js';
import { KyselyAssignmentRepository, KyselyEmployeeRepository } from './repositories/employees.js';
import { KyselyFoamRepository } from './repositories/foam.js';
import { KyselyFurnitureRepository } from './repositories/furniture.js';
import { KyselyStockRepository } from './repositories/stock.js';
import {
    KyselyHardwareRepository,
    KyselyPoshishRepository,
    KyselySofaRepository,
} from './repositories/stockedItems.js';
import { KyselyTransactionRepository } from './repositories/transactions.js';

export class KyselyStore implements Store {
    readonly transactions: TransactionRepository;
    readonly employees: EmployeeRepository;
    readonly assignments: AssignmentRepository;
    readonly catalog: CatalogRepository;
    readonly furniture: FurnitureRepository;
    readonly foam: FoamRepository;
    readonly sofas: StockedItemRepository<SofaItem, NewSofaItem>;
    readonly hardware: StockedItemRepository<HardwareMaterial, NewHardwareMaterial>;
    readonly poshish: StockedItemRepository<PoshishMaterial, NewPoshishMaterial>;
    readonly stock: StockRepository;

    constructor(private readonly db: KyselyDB) {
        this.transactions = new KyselyTransactionRepository(db);
        this.employees = new KyselyEmployeeRepository(db);
        this.assignments = new KyselyAssignmentRepository(db);
        this.catalog = new KyselyCatalogRepository(db);
        this.furniture = new KyselyFurnitureRepository(db);
        this.foam = new KyselyFoamRepository(db);
        this.sofas = new KyselySofaRepository(db);
        this.hardware = new KyselyHardwareRepository(db);
        this.poshish = new KyselyPoshishRepository(db);
        this.stock = new KyselyStockRepository(db);
    }

    async transaction<T>(fn: (store: Store) => Promise<T>): Promise<T> {
        if (this.db.isTransaction) {
            return fn(this);
        }
        return this.db.transaction().execute((trx) => fn(new KyselyStore(trx)));
    }
}

export function createKyselyStore(db: KyselyDB): Store {
    return new KyselyStore(db);
}
