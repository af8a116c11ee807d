import type { Logger } from "pino";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { CustomerCatalog } from "../clients/customer";
import type { VehicleCatalog, VehicleFinalizer } from "../clients/vehicle";
import type { MessageChannel } from "../events/channel";
import { buildEnvelope } from "../events/envelope";
import { parseInboundEvent, type CommandPayload, type InboundEvent } from "../events/messages";
import { isEventTopic, type CommandTopic, type EventTopic } from "../events/topics";
import {
  AlreadyTerminalError,
  CompensationInProgressError,
  InvalidRequestError,
  NotFoundError,
  TooAdvancedToCancelError,
  VersionConflictError,
  describeError
} from "../errors";
import { logger as rootLogger } from "../logger";
import { buildSagaEventId, newTransactionId } from "./saga";
import {
  getStep,
  planCompensation,
  purchaseSaga,
  resolveTransition,
  stepAwaiting,
  type CommandOptions,
  type SagaDefinition,
  type SagaStep,
  type Transition
} from "./saga-definition";
import type { SagaStore } from "./saga-store";
import {
  isTerminal,
  paymentTypeSchema,
  type CompensationTarget,
  type SagaEventRecord,
  type SagaRecord,
  type StepName
} from "./saga-types";

export const purchaseRequestSchema = z.object({
  customer_id: z.number().int().positive(),
  vehicle_id: z.number().int().positive(),
  payment_type: paymentTypeSchema
});

export type PurchaseRequest = z.infer<typeof purchaseRequestSchema>;

export type EventOutcome =
  // the event moved the saga
  | "applied"
  // duplicate of the event behind the current state; the outstanding command was published again
  | "redriven"
  // success of a step interrupted by cancellation or timeout; its compensation was published
  | "orphan-compensated"
  | "discarded"
  | "invalid"
  | "unknown-saga";

export type OrchestratorOptions = {
  store: SagaStore;
  channel: MessageChannel;
  finalizer: VehicleFinalizer;
  // Without a catalog the purchase amount is left to the credit participant (sent as 0).
  catalog?: VehicleCatalog | null;
  // Without a customer lookup the balance check is left to the credit participant.
  customers?: CustomerCatalog | null;
  definition?: SagaDefinition;
  serviceName?: string;
  paymentMethod?: string;
  // 0 disables expiry of stale sagas.
  sagaTimeoutMs?: number;
  staleBatchSize?: number;
  // Cancellation re-reads the saga this many times when an event lands concurrently.
  cancelAttempts?: number;
  logger?: Logger;
};

type OutstandingCommand = { topic: CommandTopic; payload: CommandPayload };

type CompensationStart = {
  target: CompensationTarget;
  failureReason: string | null;
  interruptedStep: StepName | null;
  eventType: string;
  lastEventType: string | null;
  payload: Record<string, unknown>;
};

function assertNever(value: never): never {
  throw new Error(`Unhandled transition: ${JSON.stringify(value)}`);
}

export class SagaOrchestrator {
  private readonly definition: SagaDefinition;
  private readonly logger: Logger;
  private readonly commandOptions: CommandOptions;
  private readonly serviceName: string;
  private readonly sagaTimeoutMs: number;
  private readonly staleBatchSize: number;
  private readonly cancelAttempts: number;

  constructor(private readonly options: OrchestratorOptions) {
    this.definition = options.definition ?? purchaseSaga;
    this.logger = options.logger ?? rootLogger;
    this.commandOptions = { paymentMethod: options.paymentMethod ?? "pix" };
    this.serviceName = options.serviceName ?? "saga-orchestrator";
    this.sagaTimeoutMs = options.sagaTimeoutMs ?? 0;
    this.staleBatchSize = options.staleBatchSize ?? 100;
    this.cancelAttempts = options.cancelAttempts ?? 5;
  }

  /** Registers the event handler on every topic the saga definition listens to. */
  start(): void {
    this.options.channel.subscribe(this.definition.eventTopics, async (message) => {
      await this.handleEvent(message.topic, message.envelope.data, message.envelope.traceId);
    });
  }

  /**
   * Validates the request, persists the saga as STARTED and issues the first command.
   * Returns as soon as the command is published; the outcome is read through `getState`.
   */
  async startPurchase(input: unknown, options: { traceId?: string } = {}): Promise<SagaRecord> {
    const parsed = purchaseRequestSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidRequestError(
        "Invalid purchase request",
        parsed.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
      );
    }
    const request = parsed.data;
    const traceId = options.traceId ?? uuidv4();
    const amount = await this.priceVehicle(request.vehicle_id, traceId);
    await this.checkCustomer(request, amount, traceId);

    const saga = await this.options.store.createSaga({
      transactionId: newTransactionId(),
      traceId,
      customerId: request.customer_id,
      vehicleId: request.vehicle_id,
      paymentType: request.payment_type,
      amount,
      status: "STARTED",
      paymentCode: null,
      paymentId: null,
      completedSteps: [],
      compensation: null,
      interruptedStep: null,
      lastEventType: null,
      failureReason: null
    });
    const log = this.sagaLogger(saga);
    await this.audit(saga, "PURCHASE_REQUESTED", { ...request, amount });

    try {
      await this.dispatchOutstanding(saga);
    } catch (error) {
      log.error({ error }, "Failed to publish initial command");
      await this.commit(
        saga,
        { ...saga, status: "FAILED", failureReason: `failed to publish initial command: ${describeError(error)}` },
        "INITIAL_COMMAND_FAILED",
        {}
      );
      throw error;
    }

    log.info(
      { customerId: saga.customerId, vehicleId: saga.vehicleId, paymentType: saga.paymentType, amount },
      "Purchase saga started"
    );
    return saga;
  }

  /**
   * Applies one participant event. Rejects only when the mutation could not be stored
   * or the follow-up command could not be published, so the transport redelivers.
   */
  async handleEvent(topic: string, data: unknown, traceId?: string): Promise<EventOutcome> {
    if (!isEventTopic(topic)) {
      this.logger.warn({ topic, traceId }, "Ignoring message on unknown topic");
      return "invalid";
    }
    const parsed = parseInboundEvent(topic, data);
    if (!parsed.ok) {
      this.logger.warn({ topic, traceId, issues: parsed.issues }, "Dropping malformed event");
      return "invalid";
    }
    const event = parsed.event;

    let saga: SagaRecord;
    try {
      saga = await this.options.store.getSagaById(event.transactionId);
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.logger.warn({ topic, traceId, transactionId: event.transactionId }, "Dropping event for unknown saga");
        return "unknown-saga";
      }
      throw error;
    }

    const transition = resolveTransition(this.definition, saga, topic);
    if (!transition) {
      return this.handleUnmatched(saga, topic, event);
    }
    await this.apply(saga, transition, topic, event);
    return "applied";
  }

  /**
   * Compensates whatever completed so far and ends the saga CANCELLED. A participant
   * event committed concurrently makes the attempt start over on the fresh record.
   */
  async cancel(transactionId: string): Promise<SagaRecord> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await this.tryCancel(transactionId);
      } catch (error) {
        if (!(error instanceof VersionConflictError) || attempt >= this.cancelAttempts) {
          throw error;
        }
        this.logger.debug({ transactionId, attempt }, "Saga moved during cancellation; retrying");
      }
    }
  }

  private async tryCancel(transactionId: string): Promise<SagaRecord> {
    const saga = await this.options.store.getSagaById(transactionId);
    if (isTerminal(saga.status)) {
      throw new AlreadyTerminalError(saga.transactionId, saga.status);
    }
    if (saga.status === this.definition.finalStatus) {
      // Payment cleared and the vehicle sale is under way.
      throw new TooAdvancedToCancelError(saga.transactionId);
    }
    if (saga.status === "COMPENSATING") {
      if (saga.compensation?.target !== "CANCELLED") {
        throw new CompensationInProgressError(saga.transactionId);
      }
      // Repeated cancellation: make sure the awaited compensation is out.
      await this.dispatchOutstanding(saga);
      return saga;
    }

    const inFlight = stepAwaiting(this.definition, saga.status);
    const cancelled = await this.beginCompensation(saga, {
      target: "CANCELLED",
      failureReason: null,
      interruptedStep: inFlight?.name ?? null,
      eventType: "CANCELLATION_REQUESTED",
      lastEventType: null,
      payload: { interrupted_step: inFlight?.name ?? null }
    });
    this.sagaLogger(saga).info({ status: cancelled.status }, "Saga cancellation accepted");
    return cancelled;
  }

  async getState(transactionId: string): Promise<SagaRecord> {
    return this.options.store.getSagaById(transactionId);
  }

  async getHistory(transactionId: string): Promise<SagaEventRecord[]> {
    await this.options.store.getSagaById(transactionId);
    return this.options.store.getEventsByTransactionId(transactionId);
  }

  /**
   * Watchdog pass: compensates forward sagas that waited longer than the configured
   * timeout and fails compensations that were never acknowledged.
   */
  async expireStaleSagas(now: Date = new Date()): Promise<number> {
    if (this.sagaTimeoutMs <= 0) {
      return 0;
    }
    const cutoff = new Date(now.getTime() - this.sagaTimeoutMs);
    const stale = await this.options.store.listStaleSagas(cutoff, this.staleBatchSize);
    let expired = 0;
    for (const saga of stale) {
      try {
        await this.expire(saga);
        expired += 1;
      } catch (error) {
        if (error instanceof VersionConflictError) {
          this.sagaLogger(saga).debug("Stale saga moved on concurrently");
          continue;
        }
        this.sagaLogger(saga).error({ error }, "Failed to expire stale saga");
      }
    }
    return expired;
  }

  private async apply(saga: SagaRecord, transition: Transition, topic: EventTopic, event: InboundEvent): Promise<void> {
    switch (transition.kind) {
      case "advance":
        await this.advance(saga, transition.step, topic, event);
        return;
      case "stepFailed":
        await this.beginCompensation(saga, {
          target: "FAILED",
          failureReason: `${transition.step.name} step failed: ${event.reason ?? "no reason given"}`,
          interruptedStep: null,
          eventType: topic,
          lastEventType: topic,
          payload: event
        });
        return;
      case "finalize":
        await this.finalize(saga);
        return;
      case "compensated":
        await this.compensated(saga, transition.step, topic, event);
        return;
      case "compensationRefused":
        await this.compensationRefused(saga, transition.step, topic, event);
        return;
      default:
        assertNever(transition);
    }
  }

  private async advance(saga: SagaRecord, step: SagaStep, topic: EventTopic, event: InboundEvent): Promise<void> {
    const next: SagaRecord = {
      ...saga,
      ...step.capture?.(event),
      status: step.completedStatus,
      completedSteps: [...saga.completedSteps, step.name],
      lastEventType: topic
    };
    const written = await this.commit(saga, next, topic, event);
    this.sagaLogger(written).info({ step: step.name, status: written.status }, "Saga step completed");
    if (written.status === this.definition.finalStatus) {
      await this.finalize(written);
      return;
    }
    await this.dispatchOutstanding(written);
  }

  private async finalize(saga: SagaRecord): Promise<SagaRecord> {
    const log = this.sagaLogger(saga);
    try {
      await this.options.finalizer.markVehicleSold(saga.vehicleId, saga.traceId);
    } catch (error) {
      // Payment has cleared; refunding is an operator decision.
      log.error({ error, vehicleId: saga.vehicleId }, "Vehicle not marked as sold after payment; manual intervention required");
      return this.commit(
        saga,
        { ...saga, status: "FAILED", failureReason: `post-payment finalization failed: ${describeError(error)}` },
        "FINALIZATION_FAILED",
        { vehicle_id: saga.vehicleId }
      );
    }
    const completed = await this.commit(saga, { ...saga, status: "COMPLETED" }, "SAGA_COMPLETED", {
      vehicle_id: saga.vehicleId,
      payment_id: saga.paymentId
    });
    log.info("Saga completed");
    return completed;
  }

  private async beginCompensation(saga: SagaRecord, start: CompensationStart): Promise<SagaRecord> {
    const planned = planCompensation(
      this.definition,
      {
        ...saga,
        failureReason: start.failureReason ?? saga.failureReason,
        interruptedStep: start.interruptedStep,
        lastEventType: start.lastEventType
      },
      start.target
    );
    const written = await this.commit(saga, planned, start.eventType, start.payload);
    this.sagaLogger(written).warn(
      {
        target: start.target,
        status: written.status,
        pendingStep: written.compensation?.pendingStep ?? null,
        failureReason: written.failureReason
      },
      "Saga compensating"
    );
    await this.dispatchOutstanding(written);
    return written;
  }

  private async compensated(saga: SagaRecord, step: SagaStep, topic: EventTopic, event: InboundEvent): Promise<void> {
    const target = saga.compensation?.target ?? "FAILED";
    const planned = planCompensation(
      this.definition,
      { ...saga, completedSteps: saga.completedSteps.slice(0, -1), lastEventType: topic },
      target
    );
    const written = await this.commit(saga, planned, topic, event);
    this.sagaLogger(written).info(
      { step: step.name, status: written.status, pendingStep: written.compensation?.pendingStep ?? null },
      "Compensation acknowledged"
    );
    await this.dispatchOutstanding(written);
  }

  private async compensationRefused(
    saga: SagaRecord,
    step: SagaStep,
    topic: EventTopic,
    event: InboundEvent
  ): Promise<void> {
    const command = step.compensation?.command ?? step.name;
    const written = await this.commit(
      saga,
      {
        ...saga,
        status: "FAILED",
        compensation: null,
        lastEventType: topic,
        failureReason: `compensation ${command} refused: ${event.reason ?? "no reason given"}`
      },
      topic,
      event
    );
    this.sagaLogger(written).error(
      { step: step.name, failureReason: written.failureReason },
      "Compensation refused; manual intervention required"
    );
  }

  private async handleUnmatched(saga: SagaRecord, topic: EventTopic, event: InboundEvent): Promise<EventOutcome> {
    const log = this.sagaLogger(saga);
    const orphan = this.orphanedCompensation(saga, topic, event);
    if (orphan) {
      await this.publishCommand(saga, orphan.topic, orphan.payload);
      log.warn({ topic, compensation: orphan.topic }, "Interrupted step succeeded late; compensating it");
      return "orphan-compensated";
    }
    if (!isTerminal(saga.status) && saga.lastEventType === topic) {
      await this.dispatchOutstanding(saga);
      log.info({ topic, status: saga.status }, "Event redelivered; outstanding command published again");
      return "redriven";
    }
    log.debug({ topic, status: saga.status }, "Discarding duplicate or out-of-order event");
    return "discarded";
  }

  private orphanedCompensation(saga: SagaRecord, topic: EventTopic, event: InboundEvent): OutstandingCommand | null {
    if (!saga.interruptedStep) {
      return null;
    }
    const step = getStep(this.definition, saga.interruptedStep);
    if (topic !== step.successEvent || !step.compensation) {
      return null;
    }
    return {
      topic: step.compensation.command,
      payload: step.compensation.build({ ...saga, ...step.capture?.(event) })
    };
  }

  private async expire(saga: SagaRecord): Promise<void> {
    if (saga.status === "COMPENSATING") {
      const pending = saga.compensation?.pendingStep;
      const command = pending ? (getStep(this.definition, pending).compensation?.command ?? pending) : "compensation";
      const failed = await this.commit(
        saga,
        {
          ...saga,
          status: "FAILED",
          compensation: null,
          failureReason: `compensation ${command} not acknowledged within ${this.sagaTimeoutMs}ms`
        },
        "COMPENSATION_TIMED_OUT",
        {}
      );
      this.sagaLogger(failed).error({ failureReason: failed.failureReason }, "Compensation timed out; manual intervention required");
      return;
    }
    if (saga.status === this.definition.finalStatus) {
      await this.finalize(saga);
      return;
    }
    const inFlight = stepAwaiting(this.definition, saga.status);
    await this.beginCompensation(saga, {
      target: "FAILED",
      failureReason: `timed out waiting for ${inFlight ? inFlight.successEvent : "the next event"}`,
      interruptedStep: inFlight?.name ?? null,
      eventType: "SAGA_TIMED_OUT",
      lastEventType: null,
      payload: { timeout_ms: this.sagaTimeoutMs }
    });
  }

  private async priceVehicle(vehicleId: number, traceId: string): Promise<number> {
    const catalog = this.options.catalog;
    if (!catalog) {
      return 0;
    }
    const vehicle = await catalog.getVehicle(vehicleId, traceId);
    if (!vehicle) {
      throw new NotFoundError("vehicle", String(vehicleId));
    }
    if (!vehicle.available) {
      throw new InvalidRequestError("Vehicle is not available for purchase");
    }
    if (vehicle.price <= 0) {
      throw new InvalidRequestError("Vehicle has no valid price");
    }
    return vehicle.price;
  }

  private async checkCustomer(request: PurchaseRequest, amount: number, traceId: string): Promise<void> {
    const customers = this.options.customers;
    if (!customers) {
      return;
    }
    const customer = await customers.getCustomer(request.customer_id, traceId);
    if (!customer) {
      throw new NotFoundError("customer", String(request.customer_id));
    }
    if (request.payment_type === "cash" && customer.accountBalance < amount) {
      throw new InvalidRequestError("Insufficient account balance");
    }
    if (request.payment_type === "credit" && customer.availableCredit < amount) {
      throw new InvalidRequestError("Insufficient credit limit");
    }
  }

  private outstandingCommand(saga: SagaRecord): OutstandingCommand | null {
    if (saga.status === "COMPENSATING") {
      const pending = saga.compensation?.pendingStep;
      const compensation = pending ? getStep(this.definition, pending).compensation : null;
      return compensation ? { topic: compensation.command, payload: compensation.build(saga) } : null;
    }
    if (isTerminal(saga.status)) {
      return null;
    }
    const step = stepAwaiting(this.definition, saga.status);
    return step ? { topic: step.command, payload: step.build(saga, this.commandOptions) } : null;
  }

  private async dispatchOutstanding(saga: SagaRecord): Promise<void> {
    const command = this.outstandingCommand(saga);
    if (command) {
      await this.publishCommand(saga, command.topic, command.payload);
    }
  }

  private async publishCommand(saga: SagaRecord, topic: CommandTopic, payload: CommandPayload): Promise<void> {
    const envelope = buildEnvelope({
      type: topic,
      source: this.serviceName,
      subject: saga.transactionId,
      traceId: saga.traceId,
      data: payload
    });
    await this.options.channel.publish(topic, envelope, saga.transactionId);
    this.sagaLogger(saga).info({ topic }, "Published command");
  }

  private async commit(
    current: SagaRecord,
    next: SagaRecord,
    eventType: string,
    payload: Record<string, unknown>
  ): Promise<SagaRecord> {
    if (isTerminal(current.status)) {
      throw new AlreadyTerminalError(current.transactionId, current.status);
    }
    const written = await this.options.store.compareAndSwap(current.transactionId, current.version, next);
    await this.audit(written, eventType, payload);
    return written;
  }

  private async audit(saga: SagaRecord, eventType: string, payload: Record<string, unknown>): Promise<void> {
    await this.options.store.recordEvent({
      id: buildSagaEventId(saga.transactionId, eventType, saga.status),
      transactionId: saga.transactionId,
      traceId: saga.traceId,
      status: saga.status,
      eventType,
      payload
    });
  }

  private sagaLogger(saga: SagaRecord): Logger {
    return this.logger.child({ traceId: saga.traceId, transactionId: saga.transactionId });
  }
}
