/**
 * Per-session stop flag. The loop checks it at step boundaries, so a request
 * never interrupts an action that is already running.
 */
export class AgentState {
  private _stopRequested: boolean = false;
  private _reason: string | null = null;

  /**
   * Request that the session stop before its next step
   */
  public requestStop(reason: string = 'requested'): void {
    if (this._stopRequested) return;
    this._stopRequested = true;
    this._reason = reason;
  }

  public clearStop(): void {
    this._stopRequested = false;
    this._reason = null;
  }

  public isStopRequested(): boolean {
    return this._stopRequested;
  }

  public getStopReason(): string | null {
    return this._reason;
  }
}
