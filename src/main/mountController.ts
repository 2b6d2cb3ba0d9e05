import { EventEmitter } from 'events';
import { setTimeout as sleep } from 'timers/promises';
import {
  type DecValue,
  type RaValue,
  decFromWire,
  formatWire,
  parseDec,
  parseRa,
  raFromDegrees,
  toDecimalDegrees,
  toDecimalHours
} from '../common/coordinates';
import {
  CommunicationError,
  InvalidCoordinateError,
  ObjectNotFoundError,
  ProtocolError,
  UnsupportedFormatError,
  errorMessage
} from '../common/errors';
import { locationUrl, skyMapUrl } from '../common/links';
import type {
  CatalogObject,
  Declination,
  EncoderSample,
  MountMode,
  MountNotification,
  MountSnapshot,
  MountStatus,
  MountTarget,
  MoveDirections,
  RightAscension,
  SitePlacement,
  ZoomCommand
} from '../common/types';
import { type RgbRaster, readFramebuffer } from './framebuffer';
import { logInfo, logWarn } from './logger';
import { type MountTransport, type TransportOptions, createMountTransport } from './mountTransport';
import { type ScanValue, numberField, stringField, toFields } from './replyScanner';
import { assessReversal } from './reversal';
import {
  SIMULATED_ADDRESS,
  SIMULATED_PLACE,
  SIMULATED_ROUND,
  SIMULATED_VERSION,
  type SimulatedPosition,
  isSimulatedAddress,
  nudgeTarget,
  stepTowardTarget
} from './simulation';
import { StatusPoller } from './statusPoller';

export interface ObjectResolver {
  findObject(name: string): CatalogObject | undefined | Promise<CatalogObject | undefined>;
}

export interface BrowserLauncher {
  open(url: string): void | Promise<void>;
}

export interface MountView {
  show(raster: RgbRaster | undefined): void;
  notify?(event: MountNotification): void;
}

export type GotoTarget = { name: string } | { ra: RaValue; dec: DecValue; name?: string } | { object: CatalogObject };

export type GotoOutcome =
  | { status: 'sent'; reply: string; target: MountTarget }
  | { status: 'sent'; reply: string; planet: Planet }
  | { status: 'rejected'; error: InvalidCoordinateError | ObjectNotFoundError };

export interface StatusSummary {
  text: string;
  status: MountStatus;
  reversal: boolean;
}

export interface EncoderSummary {
  summary: string;
  reversal: boolean;
}

type MountEvents = {
  /** Carries no target for planets, whose position the mount computes itself. */
  gotoStart: [MountTarget | undefined];
  gotoReached: [];
  moving: [];
  idle: [];
  updated: [MountSnapshot];
  connected: [MountSnapshot];
  disconnected: [];
  error: [Error];
};

export type MountEventName = keyof MountEvents;

export interface MountControllerOptions {
  createTransport?: (options: TransportOptions) => MountTransport;
  resolver?: ObjectResolver;
  view?: MountView;
  launcher?: BrowserLauncher;
  pollIntervalMs?: number;
  waitIntervalMs?: number;
  connectTimeoutMs?: number;
  commandTimeoutMs?: number;
  speed?: number;
  autoReverse?: boolean;
  autoScreen?: boolean;
  now?: () => number;
}

type MountLink = { mode: 'live'; transport: MountTransport } | { mode: 'simulate' };

interface TrackingWindow {
  x: number;
  y: number;
  startedAt: number;
}

interface StatusReading extends SimulatedPosition {
  goto: boolean;
  state?: string;
}

const STATUS_FORMAT = 'RA=%d+%f&DEC=%d+%f&GOTO=%d&STATE=%4s';
const PLACE_FORMAT = 'longitude=%c%d+%d&latitude=%c%d+%d&timezone=%d';
const TIME_FORMAT = 'time=%d+%d+%d+%d+%d+%d';

const STATE_CODES = new Map<string, MountStatus>([
  ['INIT', 'INIT'],
  ['SCOP', 'SCOPE'],
  ['GOTO', 'GOTO'],
  ['USER', 'USER'],
  ['CHAR', 'CHART']
]);

const PLANETS = ['mercury', 'venus', 'moon', 'mars', 'jupiter', 'saturn', 'uranus', 'neptune'] as const;

export type Planet = (typeof PLANETS)[number];

const NOTIFICATIONS: ReadonlySet<string> = new Set<MountNotification>(['gotoStart', 'gotoReached', 'moving', 'idle', 'updated']);

const NO_MOTION: MoveDirections = { north: false, south: false, east: false, west: false };

export const DEFAULT_SPEED = 6;
const MAX_SPEED = 8;
const SECONDS_PER_DAY = 86400;
/** Minimum tracking window before the RA rate is evaluated, in seconds. */
const RATE_MIN_ELAPSED_S = 10;
/** Tracking windows are restarted after this many seconds. */
const RATE_WINDOW_S = 60;
/** Below this fraction of the sidereal rate the RA axis is considered stuck. */
const SLOW_RATE = 0.5;

function isNotification(event: string): event is MountNotification {
  return NOTIFICATIONS.has(event);
}

function asPlanet(name: string): Planet | undefined {
  const lower = name.trim().toLowerCase();
  return PLANETS.find((planet) => planet === lower);
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function formatDeviceTime(parts: number[]): string {
  const [year, month, day, hour, minute, second] = parts;
  return `${year}-${pad(month)}-${pad(day)} ${pad(hour)}:${pad(minute)}:${pad(second)}`;
}

function localTime(date: Date): string {
  return formatDeviceTime([
    date.getFullYear(),
    date.getMonth() + 1,
    date.getDate(),
    date.getHours(),
    date.getMinutes(),
    date.getSeconds()
  ]);
}

export class MountController extends EventEmitter {
  private link: MountLink = { mode: 'simulate' };
  private address = SIMULATED_ADDRESS;
  private version = SIMULATED_VERSION;
  private place: SitePlacement = { ...SIMULATED_PLACE };
  private deviceTime = '';
  private status: MountStatus = 'INIT';
  private ra: RightAscension = { hours: 0, minutes: 0 };
  private dec: Declination = { degrees: 0, minutes: 0, negative: false };
  private target?: MountTarget;
  private encoders: EncoderSample = { x: 0, y: 0, round: SIMULATED_ROUND };
  private rateRa?: number;
  private meridianMinutes = 0;
  private trackingWindow?: TrackingWindow;
  private speed: number;
  private reverting = false;
  private autoReverse: boolean;
  private autoScreen: boolean;
  private queue: Promise<unknown> = Promise.resolve();
  private poller: StatusPoller;
  private createTransport: (options: TransportOptions) => MountTransport;
  private resolver?: ObjectResolver;
  private view?: MountView;
  private launcher?: BrowserLauncher;
  private waitIntervalMs: number;
  private connectTimeoutMs: number;
  private commandTimeoutMs: number;
  private now: () => number;

  constructor(options: MountControllerOptions = {}) {
    super();
    this.createTransport = options.createTransport ?? createMountTransport;
    this.resolver = options.resolver;
    this.view = options.view;
    this.launcher = options.launcher;
    this.speed = options.speed ?? DEFAULT_SPEED;
    this.autoReverse = options.autoReverse ?? true;
    this.autoScreen = options.autoScreen ?? true;
    this.waitIntervalMs = options.waitIntervalMs ?? 2000;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 1000;
    this.commandTimeoutMs = options.commandTimeoutMs ?? 5000;
    this.now = options.now ?? Date.now;
    this.poller = new StatusPoller({
      intervalMs: options.pollIntervalMs ?? 5000,
      tick: async () => {
        await this.update();
      },
      onError: (err) => this.reportError(err, 'status_poll_failed')
    });
  }

  async connect(address: string): Promise<MountSnapshot> {
    return this.exclusive(async () => {
      this.poller.stop();
      this.status = 'INIT';
      this.target = undefined;
      this.trackingWindow = undefined;
      this.rateRa = undefined;
      this.address = address;
      this.link = await this.openLink(address);

      if (this.link.mode === 'live') {
        await this.readDeviceInfo(this.link.transport);
      } else {
        this.version = SIMULATED_VERSION;
        this.place = { ...SIMULATED_PLACE };
        this.encoders = { x: 0, y: 0, round: SIMULATED_ROUND };
        this.deviceTime = localTime(new Date(this.now()));
      }

      await this.doRefreshStatus();
      await this.doStart();
      await this.doSetSpeed(this.speed);

      const snapshot = this.getSnapshot();
      logInfo('mount_connected', { address, mode: this.link.mode, version: this.version });
      this.notify('connected', snapshot);
      return snapshot;
    });
  }

  async close(): Promise<void> {
    try {
      await this.exclusive(() => this.doStop());
    } finally {
      this.poller.stop();
      this.notify('disconnected');
    }
  }

  isLive(): boolean {
    return this.link.mode === 'live';
  }

  getMode(): MountMode {
    return this.link.mode;
  }

  async refreshStatus(): Promise<StatusSummary> {
    return this.exclusive(() => this.doRefreshStatus());
  }

  async refreshEncoders(): Promise<EncoderSummary> {
    return this.exclusive(() => this.doRefreshEncoders());
  }

  /** Refreshes the status, then the view when auto-screen is on. Used by the poller. */
  async update(): Promise<StatusSummary> {
    const summary = await this.refreshStatus();
    if (this.autoScreen && this.view && this.link.mode === 'live') {
      this.view.show(await this.getScreen());
    }
    return summary;
  }

  async goto(target: GotoTarget): Promise<GotoOutcome> {
    return this.exclusive(() => this.doGoto(target));
  }

  async move(directions: Partial<MoveDirections>): Promise<string> {
    return this.exclusive(() => this.doMove({ ...NO_MOTION, ...directions }));
  }

  async stop(): Promise<string> {
    return this.exclusive(() => this.doStop());
  }

  async start(): Promise<void> {
    return this.exclusive(() => this.doStart());
  }

  async setSpeed(level: number): Promise<string> {
    return this.exclusive(() => this.doSetSpeed(level));
  }

  getSpeed(): number {
    return this.speed;
  }

  async zoom(level?: number | ZoomCommand): Promise<number> {
    if (level === undefined) {
      return this.speed;
    }
    let next: number;
    switch (level) {
      case 'in':
        next = this.speed - 1;
        break;
      case 'out':
        next = this.speed + 1;
        break;
      case 'reset':
        next = DEFAULT_SPEED;
        break;
      default:
        next = level;
    }
    await this.setSpeed(next);
    return this.speed;
  }

  /** Tells the mount that the last goto target is where it actually points. */
  async align(): Promise<string> {
    return this.exclusive(async () => {
      logInfo('mount_align', { target: this.target ? this.describeTarget(this.target) : undefined });
      return this.command('align', 'OK');
    });
  }

  async sync(): Promise<string> {
    return this.align();
  }

  /** No-op unless the mount is idle in SCOPE and no reversal is already running. */
  async revert(): Promise<boolean> {
    if (this.status !== 'SCOPE' || this.reverting) {
      return false;
    }
    return this.exclusive(() => this.doRevert());
  }

  async home(): Promise<string> {
    return this.exclusive(() => this.doHome());
  }

  async park(): Promise<string> {
    return this.home();
  }

  /** Stops the mount, halts polling and sends the controller back to its start-up screen. */
  async reset(): Promise<void> {
    await this.exclusive(async () => {
      await this.doStop();
      this.poller.stop();
      const link = this.link;
      logInfo('mount_reset', { hint: 'call start() to resume' });
      if (link.mode === 'live') {
        await link.transport.send('reset?reset');
      }
    });
  }

  /** Polls the status until the mount no longer reports GOTO. */
  async waitFor(options: { timeoutMs?: number } = {}): Promise<StatusSummary> {
    const startedAt = this.now();
    for (;;) {
      const summary = await this.refreshStatus();
      if (summary.status !== 'GOTO') {
        return summary;
      }
      if (options.timeoutMs !== undefined && this.now() - startedAt >= options.timeoutMs) {
        logWarn('wait_timeout', { timeoutMs: options.timeoutMs, state: summary.text });
        return summary;
      }
      await sleep(this.waitIntervalMs);
    }
  }

  async getScreen(): Promise<RgbRaster | undefined> {
    const link = this.link;
    if (link.mode === 'simulate') {
      logInfo('simulated_command', { command: 'getscreen.bin' });
      return undefined;
    }
    const raw = await link.transport.fetchBinary('getscreen.bin');
    try {
      return readFramebuffer(raw);
    } catch (err) {
      if (err instanceof UnsupportedFormatError) {
        logWarn('screen_unsupported_format', { error: err.message });
        return undefined;
      }
      throw err;
    }
  }

  async web(): Promise<string> {
    await this.refreshStatus();
    const url = skyMapUrl(this.ra, this.dec, this.speed);
    await this.launcher?.open(url);
    return url;
  }

  async location(): Promise<string> {
    const url = locationUrl(this.place);
    await this.launcher?.open(url);
    return url;
  }

  setAutoReverse(enabled: boolean): void {
    this.autoReverse = enabled;
  }

  setAutoScreen(enabled: boolean): void {
    this.autoScreen = enabled;
  }

  isPolling(): boolean {
    return this.poller.isRunning();
  }

  getStatus(): MountStatus {
    return this.status;
  }

  getTarget(): MountTarget | undefined {
    return this.target ? this.copyTarget(this.target) : undefined;
  }

  /** Current position as decimal hours and degrees. */
  getPosition(): { ra: number; dec: number } {
    return { ra: toDecimalHours(this.ra), dec: toDecimalDegrees(this.dec) };
  }

  describe(): string {
    const text = `RA=${formatWire(this.ra)} DEC=${formatWire(this.dec)} [${this.status}]`;
    return this.target?.name ? `${text} ${this.target.name}` : text;
  }

  identify(): string {
    return `StarBook ${this.version} on ${this.address}`;
  }

  getSnapshot(): MountSnapshot {
    return {
      address: this.address,
      mode: this.link.mode,
      version: this.version,
      status: this.status,
      ra: { ...this.ra },
      dec: { ...this.dec },
      target: this.target ? this.copyTarget(this.target) : undefined,
      encoders: { ...this.encoders },
      rate: { rateRa: this.rateRa, meridianMinutes: this.meridianMinutes },
      speed: this.speed,
      reverting: this.reverting,
      autoReverse: this.autoReverse,
      autoScreen: this.autoScreen,
      polling: this.poller.isRunning(),
      place: { ...this.place },
      deviceTime: this.deviceTime,
      timestamp: this.now()
    };
  }

  onMountEvent<K extends MountEventName>(event: K, listener: (...args: MountEvents[K]) => void): () => void {
    this.on(event, listener);
    return () => {
      this.off(event, listener);
    };
  }

  private notify<K extends MountEventName>(event: K, ...args: MountEvents[K]): void {
    this.emit(event, ...args);
    if (isNotification(event) && this.view?.notify) {
      this.view.notify(event);
    }
  }

  private reportError(error: unknown, event: string): void {
    logWarn(event, { error: errorMessage(error) });
    if (this.listenerCount('error') > 0) {
      this.notify('error', error instanceof Error ? error : new Error(String(error)));
    }
  }

  /** Serializes state mutations; nested calls inside a task use the `do*` methods directly. */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async openLink(address: string): Promise<MountLink> {
    if (isSimulatedAddress(address)) {
      logInfo('mount_simulated', { address });
      return { mode: 'simulate' };
    }

    const transport = this.createTransport({ address, timeoutMs: this.commandTimeoutMs });
    try {
      const reply = await transport.sendAndScan('getversion', 'version=%s', { timeoutMs: this.connectTimeoutMs });
      this.version = stringField(toFields(reply), 0, 'version');
      logInfo('mount_connecting', { address, version: this.version });
      return { mode: 'live', transport };
    } catch (err) {
      logWarn('mount_unreachable', { address, error: errorMessage(err), fallback: 'simulate' });
      return { mode: 'simulate' };
    }
  }

  /** Reads device settings; a malformed reply keeps the simulator default for that setting. */
  private async readDeviceInfo(transport: MountTransport): Promise<void> {
    const readPlace = (place: ScanValue[]): SitePlacement => ({
      longitudeHemisphere: stringField(place, 0, 'longitude') === 'W' ? 'W' : 'E',
      longitudeDegrees: numberField(place, 1, 'longitude degrees'),
      longitudeMinutes: numberField(place, 2, 'longitude minutes'),
      latitudeHemisphere: stringField(place, 3, 'latitude') === 'S' ? 'S' : 'N',
      latitudeDegrees: numberField(place, 4, 'latitude degrees'),
      latitudeMinutes: numberField(place, 5, 'latitude minutes'),
      utcOffset: numberField(place, 6, 'timezone')
    });
    this.place = await this.scanOrDefault(transport, 'getplace', PLACE_FORMAT, { ...SIMULATED_PLACE }, readPlace);

    const round = await this.scanOrDefault(transport, 'getround', 'ROUND=%d', SIMULATED_ROUND, (fields) =>
      numberField(fields, 0, 'ROUND')
    );
    this.encoders = { x: 0, y: 0, round };

    const fallbackTime = localTime(new Date(this.now()));
    this.deviceTime = await this.scanOrDefault(transport, 'gettime', TIME_FORMAT, fallbackTime, (time) =>
      formatDeviceTime(time.map((_, index) => numberField(time, index, 'time')))
    );
  }

  private async scanOrDefault<T>(
    transport: MountTransport,
    command: string,
    format: string,
    fallback: T,
    read: (fields: ScanValue[]) => T
  ): Promise<T> {
    try {
      return read(toFields(await transport.sendAndScan(command, format)));
    } catch (err) {
      if (err instanceof ProtocolError) {
        logWarn('malformed_reply', { command, error: err.message, fallback });
        return fallback;
      }
      throw err;
    }
  }

  private async readStatus(): Promise<StatusReading> {
    const link = this.link;
    if (link.mode === 'simulate') {
      const current = { ra: this.ra, dec: this.dec };
      return stepTowardTarget(current, this.target ?? current);
    }

    try {
      const fields = toFields(await link.transport.sendAndScan('getstatus', STATUS_FORMAT));
      return {
        ra: { hours: numberField(fields, 0, 'RA'), minutes: numberField(fields, 1, 'RA minutes') },
        dec: decFromWire(numberField(fields, 2, 'DEC'), numberField(fields, 3, 'DEC minutes')),
        goto: numberField(fields, 4, 'GOTO') !== 0,
        state: stringField(fields, 5, 'STATE')
      };
    } catch (err) {
      if (err instanceof CommunicationError) {
        this.poller.stop();
        logWarn('monitoring_halted', { error: err.message, hint: 'call start() to resume' });
      }
      if (err instanceof ProtocolError) {
        logWarn('malformed_reply', { command: 'getstatus', error: err.message, kept: this.status });
        return { ra: this.ra, dec: this.dec, goto: this.status === 'GOTO' };
      }
      throw err;
    }
  }

  private async doRefreshStatus(): Promise<StatusSummary> {
    const previous = this.status;
    const reading = await this.readStatus();
    this.ra = reading.ra;
    this.dec = reading.dec;

    if (reading.goto) {
      this.status = 'GOTO';
    } else if (reading.state !== undefined) {
      const mapped = STATE_CODES.get(reading.state);
      if (mapped) {
        this.status = mapped;
      } else {
        logWarn('unknown_state_code', { state: reading.state, kept: this.status });
      }
    }

    if (previous === 'GOTO' && this.status === 'SCOPE') {
      this.notify('gotoReached');
      this.notify('idle');
    }

    const coders = await this.doRefreshEncoders();
    const text = `${this.describe()} ${coders.summary}`;
    if (coders.reversal && !this.reverting && this.autoReverse) {
      logWarn('mount_reversal_triggered', { state: text });
      await this.doRevert();
    }

    this.notify('updated', this.getSnapshot());
    return { text, status: this.status, reversal: coders.reversal };
  }

  private async doRefreshEncoders(): Promise<EncoderSummary> {
    const link = this.link;
    if (link.mode === 'simulate') {
      this.encoders = { ...this.encoders, x: 0, y: 0 };
      return { summary: 'X=0 Y=0', reversal: false };
    }

    const position = await this.scanOrDefault<{ x: number; y: number } | undefined>(link.transport, 'getxy', 'X=%d&Y=%d', undefined, (fields) => ({
      x: numberField(fields, 0, 'X'),
      y: numberField(fields, 1, 'Y')
    }));
    if (!position) {
      return { summary: `X=${this.encoders.x} Y=${this.encoders.y}`, reversal: false };
    }
    const { x, y } = position;
    this.encoders = { x, y, round: this.encoders.round };
    const summary = `X=${x} Y=${y}`;

    const assessment = assessReversal(this.encoders);
    this.meridianMinutes = assessment.meridianMinutes;
    if (assessment.raWarning) {
      logWarn('ra_axis_near_reversal', {
        deltaPercent: assessment.deltaRaPercent,
        minutesAfterMeridian: Math.abs(assessment.meridianMinutes)
      });
    }
    if (assessment.decWarning) {
      logWarn('dec_axis_near_reversal', {
        deltaPercent: assessment.deltaDec * 100,
        degrees: assessment.deltaDec * 360
      });
    }

    const stuck = this.estimateRate(x, y, assessment.deltaRaPercent, summary);
    return { summary, reversal: assessment.reversal || stuck };
  }

  /**
   * Tracks the RA motor rate over a window opened while the mount is idle.
   * Returns true when the axis looks stuck past the meridian.
   */
  private estimateRate(x: number, y: number, deltaRaPercent: number, summary: string): boolean {
    const now = this.now();
    const tracking = this.status === 'SCOPE' || this.status === 'USER';
    const elapsed = this.trackingWindow ? (now - this.trackingWindow.startedAt) / 1000 : 0;

    if (!tracking || elapsed >= RATE_WINDOW_S) {
      this.trackingWindow = undefined;
      this.rateRa = undefined;
      return false;
    }
    if (!this.trackingWindow) {
      this.trackingWindow = { x, y, startedAt: now };
      return false;
    }
    if (elapsed < RATE_MIN_ELAPSED_S) {
      return false;
    }

    const countsPerSecond = this.encoders.round / SECONDS_PER_DAY;
    this.rateRa = Math.abs(x - this.trackingWindow.x) / elapsed / countsPerSecond;
    if (this.rateRa < SLOW_RATE && this.status === 'SCOPE') {
      logWarn('slow_ra_move', {
        rate: this.rateRa,
        meridianMinutes: this.meridianMinutes,
        coders: summary,
        hint: 'check cables and tube, RA axis may be stuck'
      });
      return deltaRaPercent < 0;
    }
    return false;
  }

  private async resolveTarget(request: GotoTarget): Promise<MountTarget> {
    if ('object' in request) {
      return { ra: raFromDegrees(request.object.ra), dec: parseDec(request.object.dec), name: request.object.name };
    }
    if ('ra' in request) {
      return { ra: parseRa(request.ra), dec: parseDec(request.dec), name: request.name };
    }

    const found = this.resolver ? await this.resolver.findObject(request.name) : undefined;
    if (!found) {
      throw new ObjectNotFoundError(request.name);
    }
    return { ra: raFromDegrees(found.ra), dec: parseDec(found.dec), name: request.name };
  }

  private async doGoto(request: GotoTarget): Promise<GotoOutcome> {
    const planet = 'ra' in request || 'object' in request ? undefined : asPlanet(request.name);
    if (planet) {
      return this.doGotoPlanet(planet);
    }

    let target: MountTarget;
    try {
      target = await this.resolveTarget(request);
    } catch (err) {
      if (err instanceof InvalidCoordinateError || err instanceof ObjectNotFoundError) {
        logWarn('goto_rejected', { error: err.message });
        return { status: 'rejected', error: err };
      }
      throw err;
    }

    this.target = target;
    const command = `gotoradec?RA=${formatWire(target.ra)}&DEC=${formatWire(target.dec)}`;
    logInfo('mount_goto', { command, name: target.name });
    const reply = await this.command(command, 'OK');
    this.notify('gotoStart', this.copyTarget(target));
    this.notify('moving');
    return { status: 'sent', reply, target: this.copyTarget(target) };
  }

  /** The mount computes planet positions itself, so the name goes to the device as is. */
  private async doGotoPlanet(planet: Planet): Promise<GotoOutcome> {
    this.target = undefined;
    const command = `goto${planet}`;
    logInfo('mount_goto', { command, name: planet });
    const reply = await this.command(command, 'OK');
    this.notify('gotoStart', undefined);
    this.notify('moving');
    return { status: 'sent', reply, planet };
  }

  private async doMove(directions: MoveDirections): Promise<string> {
    const flag = (value: boolean) => (value ? 1 : 0);
    const command =
      `move?north=${flag(directions.north)}&south=${flag(directions.south)}` +
      `&east=${flag(directions.east)}&west=${flag(directions.west)}`;

    const moving = directions.north || directions.south || directions.east || directions.west;
    if (this.link.mode === 'simulate' && moving) {
      const base = this.target ?? { ra: this.ra, dec: this.dec };
      this.target = { ...nudgeTarget(base, directions), name: this.target?.name };
    }

    const reply = await this.command(command, 'OK');
    this.notify('moving');
    return reply;
  }

  private async doStop(): Promise<string> {
    if (this.link.mode === 'simulate') {
      this.target = { ra: { ...this.ra }, dec: { ...this.dec }, name: this.target?.name };
    }
    const reply = await this.command('stop', 'OK');
    await this.doMove(NO_MOTION);
    this.reverting = false;
    this.notify('idle');
    return reply;
  }

  private async doStart(): Promise<void> {
    const link = this.link;
    if (link.mode === 'live') {
      await link.transport.send('start');
    } else {
      logInfo('simulated_command', { command: 'start' });
    }
    this.poller.start();
    this.reverting = false;
  }

  private async doSetSpeed(level: number): Promise<string> {
    if (!Number.isFinite(level)) {
      logWarn('invalid_speed', { level });
      return 'ERROR:FORMAT';
    }
    this.speed = Math.round(Math.min(MAX_SPEED, Math.max(0, level)));
    return this.command(`setspeed?speed=${this.speed}`, 'OK');
  }

  private async doHome(): Promise<string> {
    if (this.link.mode === 'live') {
      logInfo('mount_home', {});
      return this.command('gohome?home=0', 'OK');
    }
    logInfo('simulated_command', { command: 'gohome?home=0' });
    const outcome = await this.doGoto({ ra: 0, dec: 0 });
    return outcome.status === 'sent' ? outcome.reply : outcome.error.message;
  }

  /**
   * Re-issues a goto to the current position so that the controller runs its
   * own meridian flip, then waits for it to finish. Only from SCOPE, never nested.
   */
  private async doRevert(): Promise<boolean> {
    if (this.status !== 'SCOPE' || this.reverting) {
      return false;
    }

    logInfo('mount_reverting', { state: this.describe() });
    this.reverting = true;
    try {
      const outcome = await this.doGoto({ ra: this.ra, dec: this.dec, name: this.target?.name });
      if (outcome.status === 'sent' && outcome.reply === 'OK') {
        await this.doWaitFor();
      }
    } finally {
      this.reverting = false;
    }
    return true;
  }

  private async doWaitFor(): Promise<StatusSummary> {
    for (;;) {
      const summary = await this.doRefreshStatus();
      if (summary.status !== 'GOTO') {
        return summary;
      }
      await sleep(this.waitIntervalMs);
    }
  }

  private async command(command: string, expected: string): Promise<string> {
    const link = this.link;
    if (link.mode === 'simulate') {
      logInfo('simulated_command', { command });
      return expected;
    }
    return String(await link.transport.sendAndScan(command, expected));
  }

  private describeTarget(target: MountTarget): string {
    return `RA=${formatWire(target.ra)} DEC=${formatWire(target.dec)}${target.name ? ` ${target.name}` : ''}`;
  }

  private copyTarget(target: MountTarget): MountTarget {
    return { ra: { ...target.ra }, dec: { ...target.dec }, name: target.name };
  }
}
