/**
 * Example 02 — Services that reference each other
 *
 * Showcases: registration in any order, lazy() to hold a peer,
 * CircularDependencyError when both sides need each other eagerly.
 */
import { CircularDependencyError, createContainer, deferred, lazy, Singleton } from '../src/index.js';

class OrderService {
  constructor(private readonly customers: () => CustomerService) {}
  ordersOf(customer: string) { return [`${customer}#1`, `${customer}#2`]; }
  describe(customer: string) { return `${this.customers().nameOf(customer)} has ${this.ordersOf(customer).length} orders`; }
}

class CustomerService {
  constructor(private readonly orders: OrderService) {}
  nameOf(id: string) { return id.toUpperCase(); }
  summary(id: string) { return this.orders.ordersOf(id).join(', '); }
}

interface Deps {
  orders: OrderService;
  customers: CustomerService;
}

// Phase 1: declare. Nothing is built yet, so order does not matter.
const container = createContainer<Deps>();
container.register('customers', new Singleton((orders: OrderService) => new CustomerService(orders), {
  args: [deferred(container, 'orders')],
}));
container.register('orders', new Singleton((getCustomers: () => CustomerService) => new OrderService(getCustomers), {
  args: [lazy(deferred(container, 'customers'))],
}));

// Phase 2: resolve on demand.
const customers = container.resolve('customers');
console.log(customers.summary('ada'));
console.log(container.resolve('orders').describe('ada'));

// Both sides eager: reported instead of overflowing the stack.
const broken = createContainer();
broken.register('a', new Singleton((b: unknown) => ({ b }), { args: [deferred(broken, 'b')] }));
broken.register('b', new Singleton((a: unknown) => ({ a }), { args: [deferred(broken, 'a')] }));

try {
  broken.resolve('a');
} catch (e) {
  if (e instanceof CircularDependencyError) console.log(e.message);
}
