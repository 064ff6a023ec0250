export { createHealthRoutes } from "./health.js";
export { createAccountRoutes } from "./accounts.js";
export { createBankAccountRoutes } from "./bank-accounts.js";
export { createBankTransactionRoutes } from "./bank-transactions.js";
export { createClientRoutes } from "./clients.js";
export { createCategoryRoutes, createExpenseRoutes } from "./expenses.js";
export { createInvoiceRoutes } from "./invoices.js";
export { createPaymentRoutes } from "./payments.js";
export { createReportRoutes } from "./reports.js";
