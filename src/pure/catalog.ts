/**
 * CATALOG ADMINISTRATION
 *
 * Validation for catalog entries created or edited by an administrator.
 */

import {Either, Left, Right} from 'purify-ts';
import {CatalogEntry} from '../domain';
import {OrderingError, orderingError} from './errors';

function checkPrices(regularPrice: number, memberPrice: number): Either<OrderingError, void> {
  if (!(regularPrice > 0)) {
    return Left(orderingError('InvalidPrice', 'Price must be greater than $0.00'));
  }
  if (!(memberPrice > 0 && memberPrice <= regularPrice)) {
    return Left(orderingError('InvalidPrice', 'Member price must be greater than $0.00 and no more than the regular price'));
  }
  return Right(undefined);
}

function checkStock(stockQuantity: number): Either<OrderingError, void> {
  if (!Number.isInteger(stockQuantity) || stockQuantity < 0) {
    return Left(orderingError('InvalidQuantity', 'Stock quantity must be a whole number of 0 or more'));
  }
  return Right(undefined);
}

export function validateCatalogEntry(input: CatalogEntry): Either<OrderingError, CatalogEntry> {
  const sku = input.sku.trim().toUpperCase();
  const name = input.name.trim();
  if (sku.length === 0) {
    return Left(orderingError('MissingField', 'SKU is required'));
  }
  if (name.length === 0) {
    return Left(orderingError('MissingField', 'Product name is required'));
  }

  return checkPrices(input.regularPrice, input.memberPrice)
    .chain(() => checkStock(input.stockQuantity))
    .map(() => ({ ...input, sku, name, category: input.category.trim() }));
}

export function updatePrices(
  entry: CatalogEntry,
  regularPrice: number,
  memberPrice: number
): Either<OrderingError, CatalogEntry> {
  return checkPrices(regularPrice, memberPrice).map(() => ({ ...entry, regularPrice, memberPrice }));
}

export function setStock(entry: CatalogEntry, stockQuantity: number): Either<OrderingError, CatalogEntry> {
  return checkStock(stockQuantity).map(() => ({ ...entry, stockQuantity }));
}
