/**
 * CATALOG PROCESSING - Coordinator
 *
 * Administrator operations on the active catalog. Removing an entry only
 * takes it out of the active catalog; order records keep their snapshots.
 */

import {Either, Left, Right} from 'purify-ts';
import {CatalogEntry} from '../domain';
import {setStock, updatePrices, validateCatalogEntry} from './catalog';
import {AppEffects} from './effects';
import {OrderingError, orderingError} from './errors';

type CatalogEffects = Pick<AppEffects, 'catalog'>;

export type CatalogChange = {
  readonly entry: CatalogEntry;
  readonly message: string;
};

function findEntry(
  sku: string
): (effects: CatalogEffects) => Promise<Either<OrderingError, CatalogEntry>> {
  return async (effects) => {
    const entry = await effects.catalog.findBySku(sku.trim().toUpperCase());
    return entry ? Right(entry) : Left(orderingError('NotFound', `Product with SKU ${sku} not found`));
  };
}

function saveChange(
  change: Either<OrderingError, CatalogEntry>,
  describe: (entry: CatalogEntry) => string
): (effects: CatalogEffects) => Promise<Either<OrderingError, CatalogChange>> {
  return async (effects) => change.caseOf<Promise<Either<OrderingError, CatalogChange>>>({
    Left: (error) => Promise.resolve(Left(error)),
    Right: async (entry) => {
      await effects.catalog.save(entry);
      return Right({ entry, message: describe(entry) });
    },
  });
}

export function listCatalog(): (effects: CatalogEffects) => Promise<CatalogEntry[]> {
  return async (effects) => {
    const entries = await effects.catalog.findAll();
    return [...entries].sort((a, b) => a.sku.localeCompare(b.sku));
  };
}

/**
 * Add a new entry, or replace an existing one when `replace` is set.
 */
export function addProduct(
  input: CatalogEntry,
  replace = false
): (effects: CatalogEffects) => Promise<Either<OrderingError, CatalogChange>> {
  return async (effects) => {
    const validated = validateCatalogEntry(input);
    const existing = await validated.caseOf<Promise<CatalogEntry | null>>({
      Left: () => Promise.resolve(null),
      Right: (entry) => effects.catalog.findBySku(entry.sku),
    });
    const checked = validated.chain((entry): Either<OrderingError, CatalogEntry> =>
      existing && !replace
        ? Left(orderingError('DuplicateProduct', `Product with SKU ${entry.sku} already exists`))
        : Right(entry)
    );
    return saveChange(checked, entry =>
      existing ? `Updated ${entry.name} (${entry.sku})` : `Added ${entry.name} (${entry.sku}) to catalog`
    )(effects);
  };
}

export type CatalogPatch = {
  readonly prices?: { readonly regularPrice: number; readonly memberPrice: number };
  readonly stockQuantity?: number;
};

export type CatalogEdit = {
  readonly entry: CatalogEntry;
  readonly messages: string[];
};

/**
 * Apply new prices and/or a new stock level to an entry. Every change is
 * validated before anything is saved, and the entry is saved once.
 */
export function editEntry(
  sku: string,
  patch: CatalogPatch
): (effects: CatalogEffects) => Promise<Either<OrderingError, CatalogEdit>> {
  return async (effects) => {
    const found = await findEntry(sku)(effects);

    const withPrices = (edit: CatalogEdit): Either<OrderingError, CatalogEdit> =>
      patch.prices
        ? updatePrices(edit.entry, patch.prices.regularPrice, patch.prices.memberPrice)
          .map(entry => ({ entry, messages: [...edit.messages, `Updated prices for ${entry.name}`] }))
        : Right(edit);
    const withStock = (edit: CatalogEdit): Either<OrderingError, CatalogEdit> =>
      patch.stockQuantity !== undefined
        ? setStock(edit.entry, patch.stockQuantity)
          .map(entry => ({ entry, messages: [...edit.messages, `Stock for ${entry.name} set to ${entry.stockQuantity}`] }))
        : Right(edit);

    const edited = found
      .map((entry): CatalogEdit => ({ entry, messages: [] }))
      .chain(withPrices)
      .chain(withStock);

    return edited.caseOf<Promise<Either<OrderingError, CatalogEdit>>>({
      Left: (error) => Promise.resolve(Left(error)),
      Right: async (edit) => {
        await effects.catalog.save(edit.entry);
        return Right(edit);
      },
    });
  };
}

export function removeFromCatalog(
  sku: string
): (effects: CatalogEffects) => Promise<Either<OrderingError, string>> {
  return async (effects) => {
    const normalized = sku.trim().toUpperCase();
    const removed = await effects.catalog.remove(normalized);
    return removed
      ? Right(`Removed ${normalized} from catalog`)
      : Left(orderingError('NotFound', `Product with SKU ${sku} not found`));
  };
}
