import { commandTopics, eventTopics, type CommandTopic, type EventTopic } from "../events/topics";
import type { CommandPayload, InboundEvent } from "../events/messages";
import type { CompensationTarget, ForwardStatus, SagaRecord, SagaStatus, StepName } from "./saga-types";

export type CommandOptions = {
  paymentMethod: string;
};

export type Compensation = {
  command: CommandTopic;
  acknowledgedBy: EventTopic;
  // Event a participant emits when it refuses to undo the step.
  refusedBy: EventTopic | null;
  build: (saga: SagaRecord) => CommandPayload;
};

export type SagaStep = {
  name: StepName;
  command: CommandTopic;
  // Status the saga holds while this step's command is in flight.
  awaitingStatus: ForwardStatus;
  completedStatus: ForwardStatus;
  successEvent: EventTopic;
  failureEvent: EventTopic;
  build: (saga: SagaRecord, options: CommandOptions) => CommandPayload;
  capture?: (event: InboundEvent) => Partial<Pick<SagaRecord, "paymentCode" | "paymentId">>;
  compensation: Compensation | null;
};

export type Transition =
  | { kind: "advance"; step: SagaStep }
  | { kind: "stepFailed"; step: SagaStep }
  | { kind: "finalize"; step: SagaStep }
  | { kind: "compensated"; step: SagaStep }
  | { kind: "compensationRefused"; step: SagaStep };

export type SagaDefinition = {
  steps: readonly SagaStep[];
  // Status reached once every step succeeded; the synchronous finalization runs from here.
  finalStatus: ForwardStatus;
  eventTopics: readonly EventTopic[];
  transitions: ReadonlyMap<string, Transition>;
};

export class SagaDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SagaDefinitionError";
  }
}

const creditCommand = (saga: SagaRecord): CommandPayload => ({
  transaction_id: saga.transactionId,
  customer_id: saga.customerId,
  amount: saga.amount,
  payment_type: saga.paymentType
});

const vehicleCommand = (saga: SagaRecord): CommandPayload => ({
  transaction_id: saga.transactionId,
  vehicle_id: saga.vehicleId
});

export const purchaseSteps: readonly SagaStep[] = [
  {
    name: "credit",
    command: commandTopics.creditReserve,
    awaitingStatus: "STARTED",
    completedStatus: "CREDIT_RESERVED",
    successEvent: eventTopics.creditReserved,
    failureEvent: eventTopics.creditReservationFailed,
    build: creditCommand,
    compensation: {
      command: commandTopics.creditRelease,
      acknowledgedBy: eventTopics.creditReleased,
      refusedBy: null,
      build: creditCommand
    }
  },
  {
    name: "vehicle",
    command: commandTopics.vehicleReserve,
    awaitingStatus: "CREDIT_RESERVED",
    completedStatus: "VEHICLE_RESERVED",
    successEvent: eventTopics.vehicleReserved,
    failureEvent: eventTopics.vehicleReservationFailed,
    build: vehicleCommand,
    compensation: {
      command: commandTopics.vehicleRelease,
      acknowledgedBy: eventTopics.vehicleReleased,
      refusedBy: null,
      build: vehicleCommand
    }
  },
  {
    name: "paymentCode",
    command: commandTopics.paymentGenerateCode,
    awaitingStatus: "VEHICLE_RESERVED",
    completedStatus: "PAYMENT_CODE_GENERATED",
    successEvent: eventTopics.paymentCodeGenerated,
    failureEvent: eventTopics.paymentCodeGenerationFailed,
    build: (saga) => ({
      transaction_id: saga.transactionId,
      customer_id: saga.customerId,
      vehicle_id: saga.vehicleId,
      amount: saga.amount,
      payment_type: saga.paymentType
    }),
    capture: (event) => ({ paymentCode: event.paymentCode }),
    // A payment code expires on its own; nothing to undo.
    compensation: null
  },
  {
    name: "payment",
    command: commandTopics.paymentProcess,
    awaitingStatus: "PAYMENT_CODE_GENERATED",
    completedStatus: "PAYMENT_PROCESSED",
    successEvent: eventTopics.paymentProcessed,
    failureEvent: eventTopics.paymentFailed,
    build: (saga, options) => ({
      transaction_id: saga.transactionId,
      payment_code: saga.paymentCode ?? "",
      payment_method: options.paymentMethod
    }),
    capture: (event) => ({ paymentId: event.paymentId }),
    compensation: {
      command: commandTopics.paymentRefund,
      acknowledgedBy: eventTopics.paymentRefunded,
      refusedBy: eventTopics.paymentRefundFailed,
      build: (saga) => ({ transaction_id: saga.transactionId, payment_id: saga.paymentId ?? "" })
    }
  }
];

function transitionKey(status: SagaStatus, topic: string): string {
  return `${status}|${topic}`;
}

/**
 * Builds the `(status, event topic) -> transition` table and rejects topologies the
 * engine cannot drive: gaps between steps, reused topics or a step awaited twice.
 */
export function compileDefinition(steps: readonly SagaStep[]): SagaDefinition {
  const lastStep = steps.at(-1);
  if (!lastStep) {
    throw new SagaDefinitionError("a saga needs at least one step");
  }

  const transitions = new Map<string, Transition>();
  const topics = new Set<EventTopic>();
  const names = new Set<StepName>();

  const claim = (topic: EventTopic) => {
    if (topics.has(topic)) {
      throw new SagaDefinitionError(`event topic ${topic} is used by more than one transition`);
    }
    topics.add(topic);
  };

  let expectedStatus: ForwardStatus = "STARTED";
  for (const step of steps) {
    if (names.has(step.name)) {
      throw new SagaDefinitionError(`step ${step.name} is declared twice`);
    }
    names.add(step.name);
    if (step.awaitingStatus !== expectedStatus) {
      throw new SagaDefinitionError(
        `step ${step.name} awaits ${step.awaitingStatus} but the previous step completes in ${expectedStatus}`
      );
    }
    if (step.completedStatus === step.awaitingStatus) {
      throw new SagaDefinitionError(`step ${step.name} does not advance the saga`);
    }

    claim(step.successEvent);
    claim(step.failureEvent);
    transitions.set(transitionKey(step.awaitingStatus, step.successEvent), { kind: "advance", step });
    transitions.set(transitionKey(step.awaitingStatus, step.failureEvent), { kind: "stepFailed", step });

    if (step.compensation) {
      claim(step.compensation.acknowledgedBy);
      transitions.set(transitionKey("COMPENSATING", step.compensation.acknowledgedBy), {
        kind: "compensated",
        step
      });
      if (step.compensation.refusedBy) {
        claim(step.compensation.refusedBy);
        transitions.set(transitionKey("COMPENSATING", step.compensation.refusedBy), {
          kind: "compensationRefused",
          step
        });
      }
    }
    expectedStatus = step.completedStatus;
  }

  // Redelivered final success while finalization is still outstanding retries it.
  transitions.set(transitionKey(lastStep.completedStatus, lastStep.successEvent), {
    kind: "finalize",
    step: lastStep
  });

  return {
    steps,
    finalStatus: lastStep.completedStatus,
    eventTopics: [...topics],
    transitions
  };
}

export const purchaseSaga = compileDefinition(purchaseSteps);

export function getStep(definition: SagaDefinition, name: StepName): SagaStep {
  const step = definition.steps.find((candidate) => candidate.name === name);
  if (!step) {
    throw new SagaDefinitionError(`unknown step ${name}`);
  }
  return step;
}

export function stepAwaiting(definition: SagaDefinition, status: SagaStatus): SagaStep | null {
  return definition.steps.find((step) => step.awaitingStatus === status) ?? null;
}

export function resolveTransition(definition: SagaDefinition, saga: SagaRecord, topic: string): Transition | null {
  const transition = definition.transitions.get(transitionKey(saga.status, topic));
  if (!transition) {
    return null;
  }
  if (transition.kind === "compensated" || transition.kind === "compensationRefused") {
    // Only the acknowledgement of the compensation currently awaited counts.
    return saga.compensation?.pendingStep === transition.step.name ? transition : null;
  }
  return transition;
}

/**
 * Consumes completed steps from the end until one needs an explicit compensation.
 * With nothing left to undo the saga lands in its compensation target.
 */
export function planCompensation(
  definition: SagaDefinition,
  saga: SagaRecord,
  target: CompensationTarget
): SagaRecord {
  let remaining = saga.completedSteps;
  let last = remaining.at(-1);
  while (last !== undefined) {
    const step = getStep(definition, last);
    if (step.compensation) {
      return {
        ...saga,
        status: "COMPENSATING",
        completedSteps: remaining,
        compensation: { target, pendingStep: step.name }
      };
    }
    remaining = remaining.slice(0, -1);
    last = remaining.at(-1);
  }
  return { ...saga, status: target, completedSteps: [], compensation: null };
}
