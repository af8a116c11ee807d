export const commandTopics = {
  creditReserve: "commands.credit.reserve",
  creditRelease: "commands.credit.release",
  vehicleReserve: "commands.vehicle.reserve",
  vehicleRelease: "commands.vehicle.release",
  paymentGenerateCode: "commands.payment.generate_code",
  paymentProcess: "commands.payment.process",
  paymentRefund: "commands.payment.refund"
} as const;

export const eventTopics = {
  creditReserved: "events.credit.reserved",
  creditReservationFailed: "events.credit.reservation_failed",
  creditReleased: "events.credit.released",
  vehicleReserved: "events.vehicle.reserved",
  vehicleReservationFailed: "events.vehicle.reservation_failed",
  vehicleReleased: "events.vehicle.released",
  paymentCodeGenerated: "events.payment.code_generated",
  paymentCodeGenerationFailed: "events.payment.code_generation_failed",
  paymentProcessed: "events.payment.processed",
  paymentFailed: "events.payment.failed",
  paymentRefunded: "events.payment.refunded",
  paymentRefundFailed: "events.payment.refund_failed"
} as const;

export type CommandTopic = (typeof commandTopics)[keyof typeof commandTopics];
export type EventTopic = (typeof eventTopics)[keyof typeof eventTopics];

const allEventTopics: readonly EventTopic[] = Object.values(eventTopics);

export function isEventTopic(topic: string): topic is EventTopic {
  return allEventTopics.some((candidate) => candidate === topic);
}
