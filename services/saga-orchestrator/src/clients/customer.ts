import { z } from "zod";
import { getResource, type ServiceClientOptions } from "./http";

// Balances come back as JSON numbers or as decimal strings.
const customerSchema = z
  .object({
    id: z.number(),
    account_balance: z.coerce.number(),
    available_credit: z.coerce.number()
  })
  .passthrough();

export type CustomerSummary = {
  id: number;
  accountBalance: number;
  availableCredit: number;
};

/** Read-only lookup used at intake to check the buyer can pay. */
export interface CustomerCatalog {
  getCustomer(customerId: number, traceId?: string): Promise<CustomerSummary | null>;
}

export async function fetchCustomer(
  options: ServiceClientOptions,
  customerId: number,
  traceId?: string
): Promise<CustomerSummary | null> {
  const customer = await getResource(options, `/customers/${customerId}`, customerSchema, traceId);
  if (!customer) {
    return null;
  }
  return {
    id: customer.id,
    accountBalance: customer.account_balance,
    availableCredit: customer.available_credit
  };
}

export function createCustomerClient(options: ServiceClientOptions): CustomerCatalog {
  return {
    getCustomer: (customerId, traceId) => fetchCustomer(options, customerId, traceId)
  };
}
