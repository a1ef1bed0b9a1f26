/**
 * Device Connections
 *
 * Per-address conversation state. A ModuleConnection exists once per module
 * address for the lifetime of a session: it owns the acknowledge-gated
 * command queue, serial discovery and the status polling bank. Groups have
 * no conversation state, so GroupConnection objects are created on demand.
 */

import { physicalToLogical } from '../core/address.js';
import type { Address } from '../core/address.js';
import { Latch } from '../core/latch.js';
import { INFINITE_TRIES, TimeoutRetryHandler } from '../core/timeout-retry.js';
import {
  OutputPortStatusMode,
  R1VAR,
  R2VAR,
  RelVarRef,
  SW_AGE_GROUP_DEFAULT,
  SW_AGE_TYPED_VARS,
  TVAR,
  THRESHOLDS,
  Var,
  describeHardware,
  hasTypeInResponse,
  toVarId,
} from '../core/protocol/defs.js';
import type {
  BeepSound,
  HardwareType,
  KeyLockStateModifier,
  LedStatus,
  MotorReverseTime,
  MotorStateModifier,
  RelayStateModifier,
  SendKeyCommand,
  TimeUnit,
} from '../core/protocol/defs.js';
import { InputType } from '../core/protocol/inputs.js';
import type {
  InputOfType,
  ModInput,
  ModNameCommentInput,
  ModSnInput,
} from '../core/protocol/inputs.js';
import * as PckGenerator from '../core/protocol/generator.js';
import type { PckCommand } from '../core/protocol/generator.js';
import { moduleLogger } from '../observability/logger.js';
import { ANY_AGE } from './status-requester.js';
import type { ModInputType, RequestParams } from './status-requester.js';
import { StatusPolling } from './status-polling.js';
import type { CommandTarget, DeviceHost, StatusItem } from './types.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface ModuleSerial {
  serial: number;
  manu: number;
  swAge: number;
  hardwareType: HardwareType;
}

export interface ModuleDetails {
  segmentId: number;
  moduleId: number;
  serial: string | null;
  firmware: string | null;
  hardwareType: HardwareType | null;
  hardwareName: string | null;
  pendingAcks: number;
}

export type ModuleInputHandler = (input: ModInput) => void;

const NAME_BLOCKS = 2;
const COMMENT_BLOCKS = 3;
const OEM_TEXT_BLOCKS = 4;

function hex(value: number, width: number): string {
  return value.toString(16).toUpperCase().padStart(width, '0');
}

// -----------------------------------------------------------------------------
// Address Connection
// -----------------------------------------------------------------------------

/**
 * Commands shared by modules and groups. Every helper returns whether the
 * command was handed to the connection.
 */
export abstract class AddressConnection implements CommandTarget {
  protected readonly logger = moduleLogger();
  protected readonly host: DeviceHost;
  protected addr: Address;

  constructor(host: DeviceHost, address: Address) {
    this.host = host;
    this.addr = address;
  }

  get address(): Address {
    return this.addr;
  }

  isGroup(): boolean {
    return this.addr.isGroup;
  }

  /** Firmware date used to pick wire encodings. */
  abstract getSwAge(): number;

  /** Whether state-changing commands request an acknowledge. */
  protected abstract get acknowledged(): boolean;

  /**
   * Send a command body to this address.
   */
  sendCommand(wantsAck: boolean, pck: PckCommand): boolean {
    return this.sendWithHeader(wantsAck, pck);
  }

  protected sendWithHeader(wantsAck: boolean, pck: PckCommand): boolean {
    const header = PckGenerator.generateAddressHeader(this.addr, this.host.getLocalSegmentId(), wantsAck);
    return this.host.sendCommand(PckGenerator.joinCommand(header, pck));
  }

  protected send(pck: PckCommand): boolean {
    return this.sendCommand(this.acknowledged, pck);
  }

  // ---------------------------------------------------------------------------
  // Outputs
  // ---------------------------------------------------------------------------

  dimOutput(outputId: number, percent: number, ramp: number): boolean {
    return this.send(PckGenerator.dimOutput(outputId, percent, ramp));
  }

  dimAllOutputs(percent: number, ramp: number): boolean {
    return this.send(PckGenerator.dimAllOutputs(percent, ramp, this.getSwAge()));
  }

  relOutput(outputId: number, percent: number): boolean {
    return this.send(PckGenerator.relOutput(outputId, percent));
  }

  toggleOutput(outputId: number, ramp: number): boolean {
    return this.send(PckGenerator.toggleOutput(outputId, ramp));
  }

  toggleAllOutputs(ramp: number): boolean {
    return this.send(PckGenerator.toggleAllOutputs(ramp));
  }

  // ---------------------------------------------------------------------------
  // Relays & Motors
  // ---------------------------------------------------------------------------

  controlRelays(states: readonly RelayStateModifier[]): boolean {
    return this.send(PckGenerator.controlRelays(states));
  }

  controlRelaysTimer(timeMs: number, states: readonly RelayStateModifier[]): boolean {
    return this.send(PckGenerator.controlRelaysTimer(timeMs, states));
  }

  controlMotorsRelays(states: readonly MotorStateModifier[]): boolean {
    return this.send(PckGenerator.controlMotorsRelays(states));
  }

  controlMotorsOutputs(state: MotorStateModifier, reverseTime?: MotorReverseTime): boolean {
    return this.send(PckGenerator.controlMotorsOutputs(state, reverseTime));
  }

  // ---------------------------------------------------------------------------
  // Scenes
  // ---------------------------------------------------------------------------

  /**
   * Activate a stored scene for the given outputs and relays.
   */
  activateScene(
    registerId: number,
    sceneId: number,
    outputIds: readonly number[] = [],
    relayIds: readonly number[] = [],
    ramp: number | null = null
  ): boolean {
    const commands: string[] = [PckGenerator.changeSceneRegister(registerId)];
    if (outputIds.length > 0) {
      commands.push(PckGenerator.activateSceneOutput(sceneId, outputIds, ramp));
    }
    if (relayIds.length > 0) {
      commands.push(PckGenerator.activateSceneRelay(sceneId, relayIds));
    }
    return commands.map((pck) => this.send(pck)).every(Boolean);
  }

  storeSceneOutputsDirect(
    registerId: number,
    sceneId: number,
    percents: readonly number[],
    ramps: readonly number[]
  ): boolean {
    return this.send(PckGenerator.storeSceneOutputsDirect(registerId, sceneId, percents, ramps));
  }

  // ---------------------------------------------------------------------------
  // Variables
  // ---------------------------------------------------------------------------

  /**
   * Set a variable to an absolute native value. Variables 1-12 have no
   * absolute command: they are reset and then incremented.
   */
  varAbs(v: Var, value: number): boolean {
    return this.varAbsFor(v, value, this.getSwAge());
  }

  varReset(v: Var): boolean {
    return this.varResetFor(v, this.getSwAge());
  }

  varRel(v: Var, value: number, ref: RelVarRef = RelVarRef.CURRENT): boolean {
    return this.varRelFor(v, value, ref, this.getSwAge());
  }

  protected varAbsFor(v: Var, value: number, swAge: number): boolean {
    if (toVarId(v) === -1) {
      return this.send(PckGenerator.varAbs(v, value));
    }
    // Group 4 forwards values into the modules' status variables
    if (this.addr.isGroup && this.addr.entityId === 4) {
      return this.send(PckGenerator.updateStatusVar(v, value));
    }
    const reset = PckGenerator.varReset(v, swAge);
    const rel = PckGenerator.varRel(v, RelVarRef.CURRENT, value, swAge);
    return [reset, rel].map((pck) => this.send(pck)).every(Boolean);
  }

  protected varResetFor(v: Var, swAge: number): boolean {
    return this.send(PckGenerator.varReset(v, swAge));
  }

  protected varRelFor(v: Var, value: number, ref: RelVarRef, swAge: number): boolean {
    return this.send(PckGenerator.varRel(v, ref, value, swAge));
  }

  // ---------------------------------------------------------------------------
  // Regulators, LEDs & Keys
  // ---------------------------------------------------------------------------

  lockRegulator(regId: number, locked: boolean): boolean {
    return this.send(PckGenerator.lockRegulator(regId, locked));
  }

  controlLed(ledId: number, state: LedStatus): boolean {
    return this.send(PckGenerator.controlLed(ledId, state));
  }

  sendKeys(commands: readonly SendKeyCommand[], keys: readonly boolean[]): boolean {
    return this.send(PckGenerator.sendKeys(commands, keys));
  }

  sendKeysHitDeferred(tableId: number, time: number, unit: TimeUnit, keys: readonly boolean[]): boolean {
    return this.send(PckGenerator.sendKeysHitDeferred(tableId, time, unit, keys));
  }

  lockKeys(tableId: number, states: readonly KeyLockStateModifier[]): boolean {
    return this.send(PckGenerator.lockKeys(tableId, states));
  }

  lockKeysTabATemporary(time: number, unit: TimeUnit, keys: readonly boolean[]): boolean {
    return this.send(PckGenerator.lockKeysTabATemporary(time, unit, keys));
  }

  // ---------------------------------------------------------------------------
  // Misc
  // ---------------------------------------------------------------------------

  /**
   * Show a text row on a display periphery, split into 12-byte parts.
   */
  dynText(rowId: number, text: string): boolean {
    const parts = PckGenerator.splitDynText(text);
    return parts.map((part, partId) => this.send(PckGenerator.dynTextPart(rowId, partId, part))).every(Boolean);
  }

  beep(sound: BeepSound, count: number): boolean {
    return this.send(PckGenerator.beep(sound, count));
  }

  /**
   * Send a raw command body.
   */
  pck(pck: PckCommand): boolean {
    return this.send(pck);
  }
}

// -----------------------------------------------------------------------------
// Group Connection
// -----------------------------------------------------------------------------

/** Variables older group members only understand in the legacy form. */
const LEGACY_ABS_VARS: readonly Var[] = [TVAR, Var.R1VARSETPOINT, Var.R2VARSETPOINT];
const LEGACY_RESET_VARS: readonly Var[] = [TVAR, Var.R1VARSETPOINT, Var.R2VARSETPOINT];
const LEGACY_REL_VARS: readonly Var[] = [
  TVAR,
  R1VAR,
  R2VAR,
  Var.R1VARSETPOINT,
  Var.R2VARSETPOINT,
  ...(THRESHOLDS[0] ?? []),
];

/**
 * Commands addressed to a group. Members may run any firmware, so variable
 * commands go out in both encodings where the legacy one exists.
 */
export class GroupConnection extends AddressConnection {
  getSwAge(): number {
    return SW_AGE_GROUP_DEFAULT;
  }

  protected get acknowledged(): boolean {
    return false;
  }

  override varAbs(v: Var, value: number): boolean {
    const sent = this.varAbsFor(v, value, SW_AGE_TYPED_VARS);
    if (LEGACY_ABS_VARS.includes(v)) {
      return this.varAbsFor(v, value, 0) && sent;
    }
    return sent;
  }

  override varReset(v: Var): boolean {
    const sent = this.varResetFor(v, SW_AGE_TYPED_VARS);
    if (LEGACY_RESET_VARS.includes(v)) {
      return this.varResetFor(v, 0) && sent;
    }
    return sent;
  }

  override varRel(v: Var, value: number, ref: RelVarRef = RelVarRef.CURRENT): boolean {
    const sent = this.varRelFor(v, value, ref, SW_AGE_TYPED_VARS);
    if (LEGACY_REL_VARS.includes(v)) {
      return this.varRelFor(v, value, ref, 0) && sent;
    }
    return sent;
  }
}

// -----------------------------------------------------------------------------
// Module Connection
// -----------------------------------------------------------------------------

export class ModuleConnection extends AddressConnection {
  private readonly wantsAck: boolean;
  private serial: ModuleSerial | null = null;
  private readonly serialKnown = new Latch();
  private readonly serialRequest: TimeoutRetryHandler;

  private ackQueue: PckCommand[] = [];
  private readonly ackRequest: TimeoutRetryHandler;

  private readonly polling: StatusPolling;
  private inputHandlers: Set<ModuleInputHandler> = new Set();

  constructor(host: DeviceHost, address: Address, wantsAck = host.settings.acknowledge) {
    super(host, address);
    this.wantsAck = wantsAck;

    this.serialRequest = new TimeoutRetryHandler(INFINITE_TRIES, host.settings.defaultTimeoutMs);
    this.serialRequest.setTimeoutCallback((failed) => {
      if (!failed) {
        this.sendWithHeader(false, PckGenerator.requestSerial());
      }
    });

    this.ackRequest = new TimeoutRetryHandler(host.settings.numTries, host.settings.defaultTimeoutMs);
    this.ackRequest.setTimeoutCallback((failed) => this.onAckTimeout(failed));

    this.polling = new StatusPolling({
      settings: host.settings,
      getSwAge: () => this.getSwAge(),
      sendStatusRequest: (pck) => {
        this.sendWithHeader(false, pck);
      },
      waitForSerial: () => this.serialKnown.wait(),
      waitForSegmentScan: () => host.waitForSegmentScan(),
    });
  }

  protected get acknowledged(): boolean {
    return this.wantsAck;
  }

  /**
   * Move the connection to another address. Used when the local segment id
   * resolves after the connection was created.
   */
  setAddress(address: Address): void {
    this.addr = address;
  }

  // ---------------------------------------------------------------------------
  // Firmware & Serial
  // ---------------------------------------------------------------------------

  /**
   * Firmware date, or the modern default until the serial is known.
   */
  getSwAge(): number {
    return this.serial?.swAge ?? SW_AGE_GROUP_DEFAULT;
  }

  getSerial(): Readonly<ModuleSerial> | null {
    return this.serial ? { ...this.serial } : null;
  }

  /**
   * Resolves true once the serial is known, false if the session ends first.
   */
  waitForSerial(): Promise<boolean> {
    return this.serialKnown.wait();
  }

  /**
   * Ask for the serial until the module answers. Starts after the segment
   * scan so the address header uses the right segment id.
   */
  async requestSerials(): Promise<void> {
    if (!(await this.host.waitForSegmentScan())) return;
    if (this.serialKnown.isSet() || this.serialKnown.isCancelled()) return;
    this.serialRequest.activate();
  }

  private setSerial(input: ModSnInput): void {
    this.serial = {
      serial: input.serial,
      manu: input.manu,
      swAge: input.swAge,
      hardwareType: input.hardwareType,
    };
    this.serialRequest.cancel();
    this.serialKnown.set();
    this.logger.debug(
      { module: this.addr, serial: hex(input.serial, 10), firmware: hex(input.swAge, 6) },
      'Module serial received'
    );
  }

  // ---------------------------------------------------------------------------
  // Acknowledged Commands
  // ---------------------------------------------------------------------------

  /**
   * Send a command. Acknowledged commands are queued and delivered one at a
   * time, each resent until acknowledged or out of tries.
   */
  override sendCommand(wantsAck: boolean, pck: PckCommand): boolean {
    if (!wantsAck) {
      return this.sendWithHeader(false, pck);
    }
    this.ackQueue.push(pck);
    this.tryProcessNextCommandWithAck();
    return true;
  }

  private tryProcessNextCommandWithAck(): void {
    if (this.ackQueue.length > 0 && !this.ackRequest.isActive()) {
      this.ackRequest.activate();
    }
  }

  private onAck(code: number): void {
    if (!this.ackRequest.isActive()) return;
    if (code !== -1) {
      this.logger.debug({ module: this.addr, code }, 'Command rejected by module');
    }
    this.ackQueue.shift();
    this.ackRequest.cancel();
    this.tryProcessNextCommandWithAck();
  }

  private onAckTimeout(failed: boolean): void {
    if (failed) {
      const dropped = this.ackQueue.shift();
      this.logger.warn({ module: this.addr, command: String(dropped) }, 'Command was not acknowledged');
      this.tryProcessNextCommandWithAck();
      return;
    }
    const head = this.ackQueue[0];
    if (head !== undefined) {
      this.sendWithHeader(true, head);
    }
  }

  getPendingAckCount(): number {
    return this.ackQueue.length;
  }

  // ---------------------------------------------------------------------------
  // Variable Commands
  // ---------------------------------------------------------------------------

  override varAbs(v: Var, value: number): boolean {
    const sent = super.varAbs(v, value);
    this.polling.pollAfterCommand(v);
    return sent;
  }

  override varReset(v: Var): boolean {
    const sent = super.varReset(v);
    this.polling.pollAfterCommand(v);
    return sent;
  }

  override varRel(v: Var, value: number, ref: RelVarRef = RelVarRef.CURRENT): boolean {
    const sent = super.varRel(v, value, ref);
    this.polling.pollAfterCommand(v);
    return sent;
  }

  // ---------------------------------------------------------------------------
  // Status Polling
  // ---------------------------------------------------------------------------

  activateStatusRequest(item: StatusItem): Promise<boolean> {
    return this.polling.activate(item);
  }

  cancelStatusRequest(item: StatusItem): void {
    this.polling.cancel(item);
  }

  isStatusRequestActive(item: StatusItem): boolean {
    return this.polling.isActive(item);
  }

  activateStatusRequests(activateS0 = false): Promise<void> {
    return this.polling.activateAll(activateS0);
  }

  cancelStatusRequests(): void {
    this.polling.cancelAll();
  }

  /**
   * Stop every scheduler. The connection is unusable afterwards.
   */
  cancelRequests(): void {
    this.serialRequest.cancel();
    this.serialKnown.cancel();
    this.ackRequest.cancel();
    this.ackQueue = [];
    this.polling.cancelAll();
  }

  // ---------------------------------------------------------------------------
  // Inputs
  // ---------------------------------------------------------------------------

  /**
   * Handle an input addressed from this module. Returns the input as
   * observers should see it, with typeless variable values attributed.
   */
  processInput(input: ModInput): ModInput {
    let resolved: ModInput = input;

    switch (input.type) {
      case InputType.MOD_ACK:
        this.onAck(input.code);
        break;
      case InputType.MOD_SN:
        this.setSerial(input);
        break;
      case InputType.MOD_STATUS_VAR:
        if (input.var === Var.UNKNOWN) {
          resolved = { ...input, var: this.polling.takeTypelessVar() };
        }
        break;
      default:
        break;
    }

    for (const handler of this.inputHandlers) {
      try {
        handler(resolved);
      } catch (error) {
        this.logger.error({ err: error, module: this.addr }, 'Input handler error');
      }
    }
    return resolved;
  }

  /**
   * Observe inputs from this module. Returns an unsubscribe function.
   */
  registerForInputs(handler: ModuleInputHandler): () => void {
    this.inputHandlers.add(handler);
    return () => {
      this.inputHandlers.delete(handler);
    };
  }

  // ---------------------------------------------------------------------------
  // Status Requests
  // ---------------------------------------------------------------------------

  private request<T extends ModInputType>(
    responseType: T,
    pck: string,
    maxAge: number,
    params: RequestParams = {}
  ): Promise<InputOfType<T> | null> {
    return this.host.statusRequester.request({ address: this.addr, responseType, pck, maxAge, params });
  }

  /**
   * Output level. The response kind follows the connection's status mode.
   */
  requestStatusOutput(outputId: number, maxAge = 0) {
    const responseType =
      this.host.settings.statusMode === OutputPortStatusMode.NATIVE
        ? InputType.MOD_STATUS_OUTPUT_NATIVE
        : InputType.MOD_STATUS_OUTPUT;
    return this.request(responseType, PckGenerator.requestOutputStatus(outputId), maxAge, { outputId });
  }

  requestStatusRelays(maxAge = 0) {
    return this.request(InputType.MOD_STATUS_RELAYS, PckGenerator.requestRelaysStatus(), maxAge);
  }

  requestStatusBinSensors(maxAge = 0) {
    return this.request(InputType.MOD_STATUS_BIN_SENSORS, PckGenerator.requestBinSensorsStatus(), maxAge);
  }

  /**
   * Variable value. Waits for the firmware date, which selects the request
   * form.
   */
  async requestStatusVar(v: Var, maxAge = 0) {
    if (!(await this.serialKnown.wait())) return null;
    const pck = PckGenerator.requestVarStatus(v, this.getSwAge());
    if (!hasTypeInResponse(v, this.getSwAge())) {
      this.polling.markTypelessVar(v);
    }
    return this.request(InputType.MOD_STATUS_VAR, pck, maxAge, { var: v });
  }

  requestStatusLedsAndLogicOps(maxAge = 0) {
    return this.request(InputType.MOD_STATUS_LEDS_AND_LOGIC_OPS, PckGenerator.requestLedsAndLogicOps(), maxAge);
  }

  requestStatusLockedKeys(maxAge = 0) {
    return this.request(InputType.MOD_STATUS_KEY_LOCKS, PckGenerator.requestKeyLockStatus(), maxAge);
  }

  requestStatusScene(registerId: number, sceneId: number, maxAge = 0) {
    return this.request(
      InputType.MOD_STATUS_SCENE_OUTPUTS,
      PckGenerator.requestStatusScene(registerId, sceneId),
      maxAge,
      { sceneId }
    );
  }

  requestSerialInfo(maxAge = ANY_AGE) {
    return this.request(InputType.MOD_SN, PckGenerator.requestSerial(), maxAge);
  }

  requestName(maxAge = ANY_AGE): Promise<string | null> {
    return this.requestText('N', NAME_BLOCKS, PckGenerator.requestName, maxAge);
  }

  requestComment(maxAge = ANY_AGE): Promise<string | null> {
    return this.requestText('K', COMMENT_BLOCKS, PckGenerator.requestComment, maxAge);
  }

  requestOemText(maxAge = ANY_AGE): Promise<string | null> {
    return this.requestText('O', OEM_TEXT_BLOCKS, PckGenerator.requestOemText, maxAge);
  }

  /**
   * Group memberships, as logical group addresses.
   */
  async requestGroupMemberships(dynamic = false, maxAge = ANY_AGE): Promise<Address[] | null> {
    const pck = dynamic
      ? PckGenerator.requestGroupMembershipDynamic()
      : PckGenerator.requestGroupMembershipStatic();
    const result = await this.request(InputType.MOD_STATUS_GROUPS, pck, maxAge, { dynamic });
    if (!result) return null;
    const localSegmentId = this.host.getLocalSegmentId();
    return result.groups.map((group) => physicalToLogical(group, localSegmentId));
  }

  private async requestText(
    command: ModNameCommentInput['command'],
    blocks: number,
    buildRequest: (blockId: number) => string,
    maxAge: number
  ): Promise<string | null> {
    const parts: string[] = [];
    for (let blockId = 0; blockId < blocks; blockId++) {
      const block = await this.request(InputType.MOD_NAME_COMMENT, buildRequest(blockId), maxAge, {
        command,
        blockId,
      });
      if (!block) return null;
      parts.push(block.text);
    }
    return parts.join('').trimEnd();
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  dumpDetails(): ModuleDetails {
    const serial = this.serial;
    return {
      segmentId: this.addr.segmentId,
      moduleId: this.addr.entityId,
      serial: serial ? hex(serial.serial, 10) : null,
      firmware: serial ? hex(serial.swAge, 6) : null,
      hardwareType: serial?.hardwareType ?? null,
      hardwareName: serial ? describeHardware(serial.hardwareType) : null,
      pendingAcks: this.ackQueue.length,
    };
  }
}
