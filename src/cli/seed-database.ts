/**
 * Sample e-commerce database seeder.
 * Generates realistic test data with Faker.js
 */

import { faker } from '@faker-js/faker';
import Database from 'better-sqlite3';
import * as logger from './logger.js';

const CATEGORIES = [
  'Electronics',
  'Computers',
  'Audio',
  'Home & Garden',
  'Kitchen',
  'Clothing',
  'Shoes',
  'Sports',
  'Books',
  'Toys',
  'Beauty',
  'Health',
];

const ORDER_STATUSES = ['Pending', 'Processing', 'Shipped', 'Completed', 'Cancelled'];
const PAYMENT_METHODS = ['Credit Card', 'Debit Card', 'PayPal', 'Bank Transfer'];

export interface SeedCounts {
  customers: number;
  products: number;
  orders: number;
}

export const DEFAULT_COUNTS: SeedCounts = {
  customers: 500,
  products: 200,
  orders: 2000,
};

/**
 * Create and seed the sample database at `dbPath`. Returns the number of order items written.
 */
export function seedSampleDatabase(dbPath: string, counts: SeedCounts = DEFAULT_COUNTS): number {
  logger.section('Creating Sample E-commerce Database');
  logger.newline();

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');

  try {
    // Disable foreign keys during seeding for performance
    db.pragma('foreign_keys = OFF');

    createSchema(db);
    seedCategories(db);
    seedCustomers(db, counts.customers);
    const prices = seedProducts(db, counts.products);
    const items = seedOrders(db, counts.orders, counts.customers, prices);

    db.pragma('foreign_keys = ON');

    logger.newline();
    logger.panel(
      `Database created successfully!\n\n` +
        `${counts.customers.toLocaleString()} customers\n` +
        `${counts.products.toLocaleString()} products\n` +
        `${counts.orders.toLocaleString()} orders (${items.toLocaleString()} items)`,
      'Database Ready',
      'success'
    );
    return items;
  } finally {
    db.close();
  }
}

/**
 * Create database schema.
 */
function createSchema(db: Database.Database): void {
  const spinner = logger.spinner('Creating schema...');

  db.exec(`
    CREATE TABLE IF NOT EXISTS customers (
      customer_id INTEGER PRIMARY KEY,
      first_name TEXT NOT NULL,
      last_name TEXT NOT NULL,
      email TEXT UNIQUE NOT NULL,
      phone TEXT,
      city TEXT,
      state TEXT,
      country TEXT DEFAULT 'USA',
      date_created TEXT DEFAULT CURRENT_TIMESTAMP,
      is_active INTEGER DEFAULT 1
    );

    CREATE TABLE IF NOT EXISTS categories (
      category_id INTEGER PRIMARY KEY,
      category_name TEXT NOT NULL UNIQUE,
      description TEXT,
      is_active INTEGER DEFAULT 1
    );

    CREATE TABLE IF NOT EXISTS products (
      product_id INTEGER PRIMARY KEY,
      product_name TEXT NOT NULL,
      category_id INTEGER,
      price REAL NOT NULL,
      cost_price REAL,
      stock_quantity INTEGER DEFAULT 0,
      description TEXT,
      sku TEXT UNIQUE,
      is_active INTEGER DEFAULT 1,
      date_created TEXT DEFAULT CURRENT_TIMESTAMP,
      FOREIGN KEY (category_id) REFERENCES categories(category_id)
    );
    CREATE INDEX IF NOT EXISTS idx_products_category ON products(category_id);

    CREATE TABLE IF NOT EXISTS orders (
      order_id INTEGER PRIMARY KEY,
      customer_id INTEGER NOT NULL,
      order_date TEXT DEFAULT CURRENT_TIMESTAMP,
      total_amount REAL NOT NULL,
      status TEXT DEFAULT 'Pending',
      shipping_address TEXT,
      payment_method TEXT,
      FOREIGN KEY (customer_id) REFERENCES customers(customer_id)
    );
    CREATE INDEX IF NOT EXISTS idx_orders_customer ON orders(customer_id);
    CREATE INDEX IF NOT EXISTS idx_orders_date ON orders(order_date);

    CREATE TABLE IF NOT EXISTS order_items (
      order_item_id INTEGER PRIMARY KEY,
      order_id INTEGER NOT NULL,
      product_id INTEGER NOT NULL,
      quantity INTEGER NOT NULL,
      unit_price REAL NOT NULL,
      total_price REAL GENERATED ALWAYS AS (quantity * unit_price) VIRTUAL,
      FOREIGN KEY (order_id) REFERENCES orders(order_id),
      FOREIGN KEY (product_id) REFERENCES products(product_id)
    );
    CREATE INDEX IF NOT EXISTS idx_order_items_order ON order_items(order_id);

    CREATE VIEW IF NOT EXISTS customer_order_summary AS
    SELECT
      c.customer_id,
      c.first_name || ' ' || c.last_name AS customer_name,
      c.email,
      COUNT(o.order_id) AS total_orders,
      COALESCE(SUM(o.total_amount), 0) AS total_spent,
      MAX(o.order_date) AS last_order_date
    FROM customers c
    LEFT JOIN orders o ON c.customer_id = o.customer_id
    GROUP BY c.customer_id;

    CREATE VIEW IF NOT EXISTS product_sales AS
    SELECT
      p.product_id,
      p.product_name,
      cat.category_name,
      COALESCE(SUM(oi.quantity), 0) AS total_quantity_sold,
      COALESCE(SUM(oi.total_price), 0) AS total_revenue
    FROM products p
    LEFT JOIN categories cat ON p.category_id = cat.category_id
    LEFT JOIN order_items oi ON p.product_id = oi.product_id
    GROUP BY p.product_id;
  `);

  spinner.succeed('Schema created with 5 tables and 2 views');
}

function seedCategories(db: Database.Database): void {
  const spinner = logger.spinner('Creating categories...');

  const insert = db.prepare('INSERT INTO categories (category_name, description) VALUES (?, ?)');
  db.transaction(() => {
    for (const category of CATEGORIES) {
      insert.run(category, faker.commerce.productDescription());
    }
  })();

  spinner.succeed(`Created ${CATEGORIES.length} categories`);
}

function seedCustomers(db: Database.Database, count: number): void {
  const spinner = logger.spinner(`Generating ${count.toLocaleString()} customers...`);

  const insert = db.prepare(`
    INSERT INTO customers (first_name, last_name, email, phone, city, state, date_created, is_active)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `);

  db.transaction(() => {
    for (let id = 1; id <= count; id++) {
      const firstName = faker.person.firstName();
      const lastName = faker.person.lastName();
      // Unique by construction
      const email = faker.internet
        .email({ firstName, lastName })
        .toLowerCase()
        .replace('@', `+${id}@`);

      insert.run(
        firstName,
        lastName,
        email,
        faker.phone.number(),
        faker.location.city(),
        faker.location.state({ abbreviated: true }),
        faker.date.between({ from: '2021-01-01', to: new Date() }).toISOString(),
        faker.datatype.boolean(0.9) ? 1 : 0
      );
    }
  })();

  spinner.succeed(`Generated ${count.toLocaleString()} customers`);
}

/**
 * Returns each product's price, indexed by product id - 1.
 */
function seedProducts(db: Database.Database, count: number): number[] {
  const spinner = logger.spinner(`Generating ${count.toLocaleString()} products...`);

  const insert = db.prepare(`
    INSERT INTO products (product_name, category_id, price, cost_price, stock_quantity, description, sku)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `);

  const prices: number[] = [];
  db.transaction(() => {
    for (let id = 1; id <= count; id++) {
      const price = parseFloat(faker.commerce.price({ min: 5, max: 2000 }));
      prices.push(price);
      insert.run(
        faker.commerce.productName(),
        faker.number.int({ min: 1, max: CATEGORIES.length }),
        price,
        Math.round(price * faker.number.float({ min: 0.4, max: 0.8 }) * 100) / 100,
        faker.number.int({ min: 0, max: 500 }),
        faker.commerce.productDescription(),
        `SKU-${String(id).padStart(6, '0')}`
      );
    }
  })();

  spinner.succeed(`Generated ${count.toLocaleString()} products`);
  return prices;
}

/**
 * Seed orders and order items. Returns the number of items written.
 */
function seedOrders(
  db: Database.Database,
  count: number,
  customerCount: number,
  prices: readonly number[]
): number {
  const spinner = logger.spinner(`Generating ${count.toLocaleString()} orders...`);

  const insertOrder = db.prepare(`
    INSERT INTO orders (order_id, customer_id, order_date, total_amount, status, shipping_address, payment_method)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `);
  const insertItem = db.prepare(`
    INSERT INTO order_items (order_id, product_id, quantity, unit_price)
    VALUES (?, ?, ?, ?)
  `);

  let totalItems = 0;
  const batchSize = 500;

  for (let batch = 0; batch < Math.ceil(count / batchSize); batch++) {
    const limit = Math.min(batchSize, count - batch * batchSize);
    db.transaction(() => {
      for (let i = 0; i < limit; i++) {
        const orderId = batch * batchSize + i + 1;
        const itemCount = faker.number.int({ min: 1, max: 4 });
        let orderTotal = 0;

        for (let j = 0; j < itemCount; j++) {
          const productId = faker.number.int({ min: 1, max: prices.length });
          const quantity = faker.number.int({ min: 1, max: 3 });
          const unitPrice = prices[productId - 1];
          insertItem.run(orderId, productId, quantity, unitPrice);
          orderTotal += unitPrice * quantity;
          totalItems++;
        }

        insertOrder.run(
          orderId,
          faker.number.int({ min: 1, max: customerCount }),
          faker.date.recent({ days: 365 }).toISOString(),
          Math.round(orderTotal * 100) / 100,
          faker.helpers.arrayElement(ORDER_STATUSES),
          faker.location.streetAddress(),
          faker.helpers.arrayElement(PAYMENT_METHODS)
        );
      }
    })();

    spinner.text = `Generating orders... ${(batch * batchSize + limit).toLocaleString()}/${count.toLocaleString()}`;
  }

  spinner.succeed(
    `Generated ${count.toLocaleString()} orders with ${totalItems.toLocaleString()} items`
  );
  return totalItems;
}
