/**
 * Unit tests for sofas, hardware and poshish materials
 */

import {
    CreateHardwareMaterialSchema,
    CreatePoshishMaterialSchema,
    CreateSofaItemSchema,
    UpdateSofaItemSchema,
} from '@workshop-ledger/shared';
import {
    hardwareMaterials,
    newHardwareMaterial,
    newPoshishMaterial,
    newSofaItem,
    poshishMaterials,
    sofaItems,
} from '../stockedItems.js';
import { NotFoundError } from '../../../utils/errors.js';
import { MemoryStore } from '../../../__tests__/support/memoryStore.js';

describe('input mapping', () => {
    it('fills optional sofa fields with null', () => {
        expect(newSofaItem(CreateSofaItemSchema.parse({ name: 'Family Sofa', sofaType: 'L-Shape' }))).toEqual({
            name: 'Family Sofa',
            sofaType: 'L-Shape',
            hardwareMaterial: null,
            poshishMaterial: null,
            seatingCapacity: null,
            qtyOnHand: 0,
            reorderLevel: 0,
            costPrice: 0,
            salePrice: 0,
            notes: null,
        });
    });

    it('defaults material units', () => {
        expect(newHardwareMaterial(CreateHardwareMaterialSchema.parse({ name: 'Screws' })).unit).toBe('pieces');
        const poshish = newPoshishMaterial(CreatePoshishMaterialSchema.parse({ name: 'Velvet', color: '  ' }));
        expect(poshish.unit).toBe('meters');
        expect(poshish.color).toBeNull();
    });
});

describe('StockedItemService', () => {
    it('creates a row and shows its badge', async () => {
        const store = new MemoryStore();
        const sofa = await sofaItems.create(
            store,
            newSofaItem(CreateSofaItemSchema.parse({ name: 'Family Sofa', sofaType: 'L-Shape', qtyOnHand: 2 }))
        );

        const card = await sofaItems.get(store, sofa.id);

        expect(card.item.name).toBe('Family Sofa');
        expect(card.badge).toBe('Low Stock');
        expect(card.badgeTone).toBe('warning');
    });

    it('updates fields without touching quantity', async () => {
        const store = new MemoryStore();
        const sofa = await sofaItems.create(
            store,
            newSofaItem(CreateSofaItemSchema.parse({ name: 'Family Sofa', sofaType: 'L-Shape', qtyOnHand: 7 }))
        );

        const updated = await sofaItems.update(
            store,
            sofa.id,
            UpdateSofaItemSchema.parse({ name: 'Family Sofa Deluxe', salePrice: 90000 })
        );

        expect(updated).toMatchObject({ name: 'Family Sofa Deluxe', salePrice: 90000, qtyOnHand: 7, sofaType: 'L-Shape' });
    });

    it('names the resource in NotFound errors', async () => {
        const store = new MemoryStore();

        await expect(sofaItems.update(store, 4, { name: 'x' })).rejects.toThrow('Sofa not found');
        await expect(hardwareMaterials.get(store, 4)).rejects.toThrow('Hardware material not found');
        await expect(poshishMaterials.deactivate(store, 4)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('lists active rows newest first with a trimmed search', async () => {
        const store = new MemoryStore();
        for (const name of ['Brass Hinge', 'Drawer Rail', 'Steel Hinge']) {
            await hardwareMaterials.create(store, newHardwareMaterial(CreateHardwareMaterialSchema.parse({ name, qtyOnHand: 5 })));
        }
        const [, rail] = await hardwareMaterials.list(store, null, 10);
        await hardwareMaterials.deactivate(store, rail.item.id);

        const all = await hardwareMaterials.list(store, undefined, 10);
        const hinges = await hardwareMaterials.list(store, '  HINGE ', 10);
        const limited = await hardwareMaterials.list(store, null, 1);

        expect(rail.item.name).toBe('Drawer Rail');
        expect(all.map((c) => c.item.name)).toEqual(['Steel Hinge', 'Brass Hinge']);
        expect(hinges.map((c) => c.item.name)).toEqual(['Steel Hinge', 'Brass Hinge']);
        expect(limited).toHaveLength(1);
    });

    it('keeps each kind in its own table', async () => {
        const store = new MemoryStore();
        await poshishMaterials.create(store, newPoshishMaterial(CreatePoshishMaterialSchema.parse({ name: 'Velvet' })));

        expect(await sofaItems.list(store, null, 10)).toEqual([]);
        expect(poshishMaterials.kind).toBe('POSHISH_MATERIAL');
    });
});
