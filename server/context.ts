import { v4 as uuidv4 } from "uuid";

/**
 * Mutable state shared by every agent and tool in one chat session.
 *
 * `userId` stays null until identity verification succeeds, so user 0 is a
 * real user and not "unverified". The exit flag only ever goes from false to true.
 */
export class InteractionContext {
  private userId: number | null = null;
  private exitFlag = false;

  constructor(public readonly sessionId: string = uuidv4()) {}

  getUserId(): number | null {
    return this.userId;
  }

  setUserId(id: number): void {
    this.userId = id;
  }

  isVerified(): boolean {
    return this.userId !== null;
  }

  requestExit(): void {
    this.exitFlag = true;
  }

  exitRequested(): boolean {
    return this.exitFlag;
  }
}
