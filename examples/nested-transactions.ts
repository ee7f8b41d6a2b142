/**
 * Nested Transaction Example
 *
 * Services call each other and each one asks for its own transaction scope.
 * Only the outermost scope talks to BEGIN / COMMIT; the inner ones become
 * savepoints on the same connection.
 */

import { TxContext, createConsoleLogger } from '@nestedtx/core';
import { createMySQLCoordinator } from '@nestedtx/mysql';
import * as mysql from 'mysql2/promise';

import type { MySQLCoordinator } from '@nestedtx/mysql';

async function reserveStock(coordinator: MySQLCoordinator, ctx: TxContext, productId: number) {
  await coordinator.runIn(ctx, async (inner) => {
    const result = await coordinator
      .getActive(inner)
      ?.query('UPDATE products SET stock = stock - 1 WHERE id = ? AND stock > 0', [productId]);

    if (!result?.affectedRows) {
      throw new Error(`Product ${productId} is out of stock`);
    }
  });
}

async function placeOrder(coordinator: MySQLCoordinator, ctx: TxContext, productIds: number[]) {
  return coordinator.runIn(ctx, async (inner) => {
    const order = await coordinator
      .getActive(inner)
      ?.query('INSERT INTO orders (status) VALUES (?)', ['pending']);

    for (const productId of productIds) {
      try {
        await reserveStock(coordinator, inner, productId);
      } catch (error) {
        // Only this item's savepoint was rolled back; the order itself survives.
        console.warn('Skipping item:', error instanceof Error ? error.message : error);
      }
    }

    return order?.insertId;
  });
}

async function main() {
  const pool = mysql.createPool({
    host: 'localhost',
    user: 'root',
    password: 'password',
    database: 'shop',
  });

  const coordinator = createMySQLCoordinator(pool, {
    debugSql: true,
    logger: createConsoleLogger('[shop]'),
  });

  coordinator.on('statement', ({ statement, duration }) => {
    console.log(`${statement} took ${duration}ms`);
  });

  try {
    const orderId = await placeOrder(coordinator, TxContext.background(), [1, 2, 3]);
    console.log('Created order:', orderId);
  } finally {
    await pool.end();
  }
}

main().catch(console.error);
