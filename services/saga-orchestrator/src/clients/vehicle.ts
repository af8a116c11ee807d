import { z } from "zod";
import { FinalizationError, describeError } from "../errors";
import { getResource, traceHeaders, type ServiceClientOptions } from "./http";

const vehicleSchema = z
  .object({
    id: z.number(),
    price: z.number(),
    is_reserved: z.union([z.boolean(), z.string()]).optional(),
    is_sold: z.union([z.boolean(), z.string()]).optional()
  })
  .passthrough();

export type VehicleSummary = {
  id: number;
  price: number;
  available: boolean;
};

/** Terminal step of the purchase, called once payment has cleared. */
export interface VehicleFinalizer {
  markVehicleSold(vehicleId: number, traceId?: string): Promise<void>;
}

/** Read-only lookup used at intake to price the purchase. */
export interface VehicleCatalog {
  getVehicle(vehicleId: number, traceId?: string): Promise<VehicleSummary | null>;
}

// The vehicle service has stored these flags both as booleans and as "true"/"false" strings.
function isSet(flag: boolean | string | undefined): boolean {
  return flag === true || flag === "true";
}

export async function fetchVehicle(
  options: ServiceClientOptions,
  vehicleId: number,
  traceId?: string
): Promise<VehicleSummary | null> {
  const vehicle = await getResource(options, `/vehicles/${vehicleId}`, vehicleSchema, traceId);
  if (!vehicle) {
    return null;
  }
  return {
    id: vehicle.id,
    price: vehicle.price,
    available: !isSet(vehicle.is_reserved) && !isSet(vehicle.is_sold)
  };
}

export async function markVehicleSold(
  options: ServiceClientOptions,
  vehicleId: number,
  traceId?: string
): Promise<void> {
  let response: Response;
  try {
    response = await fetch(`${options.baseUrl}/vehicles/${vehicleId}/mark_as_sold`, {
      method: "PATCH",
      headers: traceHeaders(traceId),
      signal: AbortSignal.timeout(options.timeoutMs)
    });
  } catch (error) {
    throw new FinalizationError(`vehicle service unreachable: ${describeError(error)}`);
  }
  if (!response.ok) {
    throw new FinalizationError(`mark_as_sold for vehicle ${vehicleId} returned ${response.status}`);
  }
}

export function createVehicleClient(options: ServiceClientOptions): VehicleFinalizer & VehicleCatalog {
  return {
    getVehicle: (vehicleId, traceId) => fetchVehicle(options, vehicleId, traceId),
    markVehicleSold: (vehicleId, traceId) => markVehicleSold(options, vehicleId, traceId)
  };
}
