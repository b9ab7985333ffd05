// ATC Phrase Relay - Phrase Session
// Drives one recognition session: pulls fragments in arrival order, matches
// each against the mapping table, and speaks the canonical phrase for every
// match before taking the next fragment.
//
// Fragment failures and synthesis failures are treated differently:
//   - the fragment source failing (RecognizerIOError) ends the session;
//   - a phrase failing to synthesize is reported and the session keeps going.
//
// The fragment source and synthesizer are released on every exit path.

import { v4 as uuidv4 } from "uuid";
import { RecognizerIOError, SynthesisError, describeError } from "./errors.js";
import { matchPhrase } from "./phrase-matcher.js";
import { SessionState } from "./types.js";
import type {
  DiagnosticEvent,
  DiagnosticsSink,
  FragmentSource,
  MappingTable,
  RecognitionFragment,
  Result,
  SessionCounters,
  SessionOutcome,
  StopReason,
  Synthesizer,
} from "./types.js";

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface PhraseSessionDeps {
  table: MappingTable;
  source: FragmentSource;
  synthesizer: Synthesizer;
  diagnostics: DiagnosticsSink;
  /** Defaults to a fresh uuid v4. */
  sessionId?: string;
}

/**
 * Valid state transitions for the session state machine.
 *
 * IDLE → LISTENING:          run()
 * LISTENING → MATCHING:      fragment arrived
 * MATCHING → DISPATCHING:    match decision made
 * DISPATCHING → LISTENING:   phrase spoken (or no match reported)
 *
 * Any state → STOPPED on cancellation, end of input, recognizer failure, or an
 * unexpected error.
 */
const VALID_TRANSITIONS: ReadonlyMap<SessionState, SessionState> = new Map([
  [SessionState.IDLE, SessionState.LISTENING],
  [SessionState.LISTENING, SessionState.MATCHING],
  [SessionState.MATCHING, SessionState.DISPATCHING],
  [SessionState.DISPATCHING, SessionState.LISTENING],
]);

export class PhraseSession {
  readonly id: string;
  private readonly deps: PhraseSessionDeps;
  private _state: SessionState = SessionState.IDLE;
  private started = false;
  private readonly counts: SessionCounters = {
    fragments: 0,
    matched: 0,
    unmatched: 0,
    synthesisFailures: 0,
  };

  constructor(deps: PhraseSessionDeps) {
    this.deps = deps;
    this.id = deps.sessionId ?? uuidv4();
  }

  get state(): SessionState {
    return this._state;
  }

  get counters(): SessionCounters {
    return { ...this.counts };
  }

  /**
   * Process fragments until the signal aborts, the source ends, or the source
   * fails. Resolves with why the session stopped; rejects only on a second call
   * or an unexpected internal error (resources are released either way).
   *
   * Cancellation is checked at the top of every iteration and while waiting for
   * the next fragment. A phrase already being spoken is allowed to finish.
   */
  async run(signal?: AbortSignal): Promise<SessionOutcome> {
    if (this.started) {
      throw new Error(`Session ${this.id} has already run. Create a new PhraseSession.`);
    }
    this.started = true;

    let reason: StopReason = "input_ended";
    let error: RecognizerIOError | undefined;

    try {
      this.transition(SessionState.LISTENING);

      while (true) {
        if (signal?.aborted) {
          reason = "cancelled";
          break;
        }

        let fragment: RecognitionFragment | null;
        try {
          fragment = await this.deps.source.next(signal);
        } catch (err) {
          reason = "recognizer_error";
          error =
            err instanceof RecognizerIOError
              ? err
              : new RecognizerIOError(`Fragment source failed: ${describeError(err)}`, { cause: err });
          break;
        }

        if (fragment === null) {
          reason = signal?.aborted ? "cancelled" : "input_ended";
          break;
        }

        await this.processFragment(fragment);
      }
    } finally {
      await this.release();
      this.transition(SessionState.STOPPED);
    }

    const counters = this.counters;
    this.report({
      ...this.stamp(),
      type: "session_stopped",
      reason,
      counters,
      ...(error ? { error: error.message } : {}),
    });

    return {
      sessionId: this.id,
      reason,
      counters,
      ...(error ? { error } : {}),
    };
  }

  private async processFragment(fragment: RecognitionFragment): Promise<void> {
    this.counts.fragments++;

    this.transition(SessionState.MATCHING);
    const result = matchPhrase(fragment.text, this.deps.table);

    this.transition(SessionState.DISPATCHING);
    if (result.kind === "matched") {
      this.counts.matched++;
      this.report({
        ...this.stamp(),
        type: "match",
        seq: fragment.seq,
        fragment: fragment.text,
        phraseId: result.phraseId,
        canonicalText: result.canonicalText,
        variant: result.variant,
      });

      const spoken = await this.speak(result.canonicalText, result.phraseId);
      if (!spoken.ok) {
        this.counts.synthesisFailures++;
        this.report({
          ...this.stamp(),
          type: "synthesis_error",
          seq: fragment.seq,
          phraseId: result.phraseId,
          message: spoken.error.message,
        });
      }
    } else {
      this.counts.unmatched++;
      this.report({ ...this.stamp(), type: "no_match", seq: fragment.seq, fragment: fragment.text });
    }

    this.transition(SessionState.LISTENING);
  }

  /** A synthesizer that throws is treated like one that returned a failure. */
  private async speak(text: string, phraseId: string): Promise<Result<void, SynthesisError>> {
    try {
      return await this.deps.synthesizer.speak(text, phraseId);
    } catch (err) {
      return {
        ok: false,
        error: new SynthesisError(`Speech synthesis failed for "${text}": ${describeError(err)}`, text, { cause: err }),
      };
    }
  }

  private async release(): Promise<void> {
    try {
      await this.deps.source.close();
    } catch (err) {
      this.report({ ...this.stamp(), type: "release_error", resource: "source", message: describeError(err) });
    }
    try {
      await this.deps.synthesizer.close();
    } catch (err) {
      this.report({ ...this.stamp(), type: "release_error", resource: "synthesizer", message: describeError(err) });
    }
  }

  private transition(to: SessionState): void {
    const from = this._state;
    if (from === SessionState.STOPPED) {
      throw new Error(`Session ${this.id} is stopped; cannot move to "${to}".`);
    }
    if (to !== SessionState.STOPPED && VALID_TRANSITIONS.get(from) !== to) {
      throw new Error(`Invalid session transition "${from}" → "${to}" (session ${this.id}).`);
    }
    this._state = to;
    this.report({ ...this.stamp(), type: "state_change", from, to });
  }

  private stamp(): { sessionId: string; at: string } {
    return { sessionId: this.id, at: new Date().toISOString() };
  }

  private report(event: DiagnosticEvent): void {
    this.deps.diagnostics.report(event);
  }
}
