import type { ScrollActivityDelegate } from "./activity";
import {
  isReversedAxis,
  type DragDetails,
  type DragEndDetails,
  type DragStartDetails,
  type DragUpdateDetails,
} from "./core";
import { assertContract } from "./errors";

/** Handle returned by `drag()`; the gesture layer feeds it pointer motion. */
export interface Drag {
  update(details: DragUpdateDetails): void;
  end(details: DragEndDetails): void;
  cancel(): void;
}

/** A drag that paused this long has stopped moving. */
const MOTION_STOPPED_DURATION_MS = 50;
/** A stationary pointer keeps carried momentum only this long. */
const MOMENTUM_RETAIN_STATIONARY_MS = 20;
/** Deltas this large break the start threshold without easing in. */
const BIG_THRESHOLD_BREAK_DISTANCE = 24;

export interface ScrollDragControllerOptions {
  delegate: ScrollActivityDelegate | null;
  details: DragStartDetails;
  onDragCanceled?: (() => void) | null;
  /** Velocity of the fling this drag interrupted, already passed through the physics. */
  carriedVelocity?: number | null;
  motionStartDistanceThreshold?: number | null;
  /** Releases slower than this settle without a fling. */
  minFlingVelocity?: number;
  /** Releases faster than this are capped. */
  maxFlingVelocity?: number;
}

export class ScrollDragController implements Drag {
  private delegate: ScrollActivityDelegate | null;
  private onDragCanceled: (() => void) | null;
  private readonly carriedVelocity: number | null;
  private readonly motionStartDistanceThreshold: number | null;
  private readonly minFlingVelocity: number;
  private readonly maxFlingVelocity: number;
  private retainMomentum: boolean;
  private lastNonStationaryTimestamp: number | null;
  private offsetSinceLastStop: number | null;
  private _lastDetails: DragDetails | null;

  constructor(opts: ScrollDragControllerOptions) {
    const threshold = opts.motionStartDistanceThreshold ?? null;
    assertContract(
      threshold === null || threshold > 0,
      "motionStartDistanceThreshold must be positive or null",
    );
    this.delegate = opts.delegate;
    this.onDragCanceled = opts.onDragCanceled ?? null;
    this.carriedVelocity = opts.carriedVelocity ?? null;
    this.motionStartDistanceThreshold = threshold;
    this.minFlingVelocity = opts.minFlingVelocity ?? 0;
    this.maxFlingVelocity = opts.maxFlingVelocity ?? Infinity;
    this.retainMomentum = this.carriedVelocity !== null && this.carriedVelocity !== 0;
    this.lastNonStationaryTimestamp = opts.details.sourceTimeStamp ?? null;
    this.offsetSinceLastStop = threshold === null ? null : 0;
    this._lastDetails = opts.details;
  }

  /** The most recent start, update or end details, or `null` once disposed. */
  get lastDetails() {
    return this._lastDetails;
  }

  /** Moves the drag onto a new owner, used when a position is replaced mid-drag. */
  updateDelegate(delegate: ScrollActivityDelegate) {
    this.delegate = delegate;
  }

  private get reversed() {
    return this.delegate !== null && isReversedAxis(this.delegate.axisDirection);
  }

  private stationaryFor(timestamp: number) {
    return this.lastNonStationaryTimestamp === null
      ? 0
      : timestamp - this.lastNonStationaryTimestamp;
  }

  private maybeLoseMomentum(offset: number, timestamp: number | undefined) {
    if (
      this.retainMomentum &&
      offset === 0 &&
      (timestamp === undefined ||
        this.stationaryFor(timestamp) > MOMENTUM_RETAIN_STATIONARY_MS)
    ) {
      this.retainMomentum = false;
    }
  }

  private adjustForScrollStartThreshold(offset: number, timestamp: number | undefined) {
    const threshold = this.motionStartDistanceThreshold;
    if (threshold === null || this.offsetSinceLastStop === null) return offset;

    if (timestamp === undefined) return offset;

    if (offset === 0) {
      // pointer stopped long enough that the next motion starts over
      if (this.stationaryFor(timestamp) > MOTION_STOPPED_DURATION_MS) {
        this.offsetSinceLastStop = 0;
      }
      return 0;
    }

    this.offsetSinceLastStop += offset;
    if (Math.abs(this.offsetSinceLastStop) <= threshold) return 0;

    // broke the threshold: from here on deltas pass straight through
    this.offsetSinceLastStop = null;
    if (Math.abs(offset) > BIG_THRESHOLD_BREAK_DISTANCE) return offset;
    return Math.min(threshold / 3, Math.abs(offset)) * Math.sign(offset);
  }

  update(details: DragUpdateDetails) {
    if (!this.delegate) return;
    this._lastDetails = details;
    let offset = details.primaryDelta;
    if (offset !== 0 && details.sourceTimeStamp !== undefined) {
      this.lastNonStationaryTimestamp = details.sourceTimeStamp;
    }
    this.maybeLoseMomentum(offset, details.sourceTimeStamp);
    offset = this.adjustForScrollStartThreshold(offset, details.sourceTimeStamp);
    if (offset === 0) return;
    if (this.reversed) offset = -offset;
    this.delegate.applyUserOffset(offset);
  }

  end(details: DragEndDetails) {
    if (!this.delegate) return;
    // pointer velocity and scroll offset grow in opposite directions
    let velocity = -details.primaryVelocity;
    if (this.reversed) velocity = -velocity;
    if (Math.abs(velocity) < this.minFlingVelocity) velocity = 0;
    velocity = Math.max(-this.maxFlingVelocity, Math.min(velocity, this.maxFlingVelocity));
    this._lastDetails = details;

    const carried = this.carriedVelocity;
    if (
      this.retainMomentum &&
      carried !== null &&
      velocity !== 0 &&
      Math.sign(velocity) === Math.sign(carried)
    ) {
      velocity += carried;
    }
    this.delegate.goBallistic(velocity);
  }

  cancel() {
    this.delegate?.goBallistic(0);
  }

  /** Called by the owner when the drag activity is replaced. */
  dispose() {
    this._lastDetails = null;
    this.delegate = null;
    const onDragCanceled = this.onDragCanceled;
    this.onDragCanceled = null;
    onDragCanceled?.();
  }
}
