/**
 * Shared TypeScript types for Storekeep
 *
 * Record shapes as returned by the API. Dates are YYYY-MM-DD strings.
 */

import type {
  EntryType,
  FulfillmentStatus,
  PaymentStatus,
  TaskPriority,
  TaskStatus,
} from '../domain/constants.js';

// ============================================
// OPERATOR
// ============================================

export interface Operator {
  id: number;
  username: string;
  createdAt: string;
}

// ============================================
// RECORDS
// ============================================

export interface Customer {
  id: number;
  createdAt: string;
  name: string;
  email: string | null;
  phone: string | null;
  city: string | null;
  country: string | null;
  externalCustomerId: string | null;
  note: string | null;
}

export interface Order {
  id: number;
  customerId: number | null;
  orderDate: string;
  orderNumber: string;
  totalAmount: number;
  currency: string;
  paymentStatus: PaymentStatus | null;
  fulfillmentStatus: FulfillmentStatus | null;
  salesChannel: string | null;
  note: string | null;
}

/** Order joined with its customer's name for display */
export interface OrderWithCustomer extends Order {
  customerName: string | null;
}

export interface LedgerEntry {
  id: number;
  date: string;
  type: EntryType;
  category: string;
  description: string | null;
  amount: number;
}

export interface Task {
  id: number;
  customerId: number | null;
  date: string;
  title: string;
  status: TaskStatus;
  priority: TaskPriority | null;
  note: string | null;
}

export interface TaskWithCustomer extends Task {
  customerName: string | null;
}

// ============================================
// LIST RESPONSES
// ============================================

export interface CustomersListResponse {
  customers: Customer[];
}

export interface OrdersListResponse {
  orders: OrderWithCustomer[];
  totalSales: number;
}

export interface LedgerTotals {
  totalIncome: number;
  totalExpense: number;
  net: number;
}

export interface LedgerListResponse extends LedgerTotals {
  entries: LedgerEntry[];
}

export interface TasksListResponse {
  tasks: TaskWithCustomer[];
}

// ============================================
// DASHBOARD
// ============================================

export interface DashboardStats extends LedgerTotals {
  totalCustomers: number;
  totalOrders: number;
  openTasks: number;
}

export interface DashboardToday {
  date: string;
  ordersToday: number;
  incomeToday: number;
  expenseToday: number;
}

export interface DashboardSummary {
  stats: DashboardStats;
  today: DashboardToday;
  recentCustomers: Customer[];
  recentOrders: OrderWithCustomer[];
  recentTasks: TaskWithCustomer[];
}
