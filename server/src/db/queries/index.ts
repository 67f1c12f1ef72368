/**
 * Kysely Query Exports
 */

// Customers
export {
    listCustomersKysely,
    getCustomerKysely,
    customerExistsKysely,
    createCustomerKysely,
    updateCustomerKysely,
    deleteCustomerKysely,
    type CustomersListParams,
} from './customersKysely.js';

// Orders
export {
    listOrdersKysely,
    sumOrderTotals,
    getOrderKysely,
    createOrderKysely,
    updateOrderKysely,
    deleteOrderKysely,
    type OrdersListParams,
} from './ordersKysely.js';

// Expenses and income
export {
    listLedgerEntriesKysely,
    getLedgerEntryKysely,
    createLedgerEntryKysely,
    updateLedgerEntryKysely,
    deleteLedgerEntryKysely,
    type LedgerListParams,
} from './ledgerKysely.js';

// Tasks
export {
    listTasksKysely,
    getTaskKysely,
    createTaskKysely,
    updateTaskKysely,
    deleteTaskKysely,
    type TasksListParams,
} from './tasksKysely.js';

// Operator account
export {
    countOperatorsKysely,
    findOperatorByUsernameKysely,
    findOperatorByIdKysely,
    createFirstOperatorKysely,
    updateOperatorPasswordKysely,
} from './operatorsKysely.js';

// Dashboard
export { getDashboardSummaryKysely } from './dashboardKysely.js';
