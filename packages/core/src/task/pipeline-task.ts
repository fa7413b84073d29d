import { subscribeWithSelector } from "zustand/middleware";
import { createStore } from "zustand/vanilla";
import type { Mutate, StoreApi } from "zustand/vanilla";

import { TaskCancelledError, describeError } from "../utils/errors";

export type TaskStatus = "idle" | "running" | "succeeded" | "failed";

export type ProgressLevel = "info" | "warning";

export interface ProgressEvent<TStage extends string = string> {
  level: ProgressLevel;
  stage: TStage;
  message: string;
  timestamp: number;
}

export type TaskOutcome<TResult> =
  | { ok: true; result: TResult }
  | { ok: false; error: string };

export interface TaskState<TResult, TStage extends string> {
  status: TaskStatus;
  stage: TStage;
  events: ProgressEvent<TStage>[];
  outcome: TaskOutcome<TResult> | null;
}

export type TaskStore<TResult, TStage extends string> = Mutate<
  StoreApi<TaskState<TResult, TStage>>,
  [["zustand/subscribeWithSelector", never]]
>;

/** What a unit of work sees of its task while running. */
export interface TaskContext<TStage extends string> {
  readonly signal: AbortSignal;
  /** Moves to a new stage, announcing it when a message is given. */
  enter(stage: TStage, message?: string): void;
  progress(message: string): void;
  warn(message: string): void;
  /** Cooperative cancellation point, call it between units of work. */
  throwIfCancelled(): void;
}

export interface PipelineTaskOptions<TStage extends string> {
  name: string;
  initialStage: TStage;
  doneStage: TStage;
  failedStage: TStage;
}

export type TaskWork<TResult, TStage extends string> = (
  context: TaskContext<TStage>
) => Promise<TResult>;

type Unsubscribe = () => void;

const createTaskStore = <TResult, TStage extends string>(
  initialStage: TStage
): TaskStore<TResult, TStage> =>
  createStore<TaskState<TResult, TStage>>()(
    subscribeWithSelector((): TaskState<TResult, TStage> => ({
      status: "idle",
      stage: initialStage,
      events: [],
      outcome: null,
    }))
  );

/**
 * A single asynchronous pipeline run. Reports progress events, then exactly
 * one terminal event (success or error). Instances are not reusable.
 */
export class PipelineTask<TResult, TStage extends string> {
  readonly name: string;

  readonly store: TaskStore<TResult, TStage>;

  private readonly options: PipelineTaskOptions<TStage>;

  private readonly work: TaskWork<TResult, TStage>;

  private readonly controller = new AbortController();

  constructor(
    options: PipelineTaskOptions<TStage>,
    work: TaskWork<TResult, TStage>
  ) {
    this.name = options.name;
    this.options = options;
    this.work = work;
    this.store = createTaskStore<TResult, TStage>(options.initialStage);
  }

  get status(): TaskStatus {
    return this.store.getState().status;
  }

  get stage(): TStage {
    return this.store.getState().stage;
  }

  get events(): ProgressEvent<TStage>[] {
    return this.store.getState().events;
  }

  onProgress(listener: (event: ProgressEvent<TStage>) => void): Unsubscribe {
    return this.store.subscribe(
      (state) => state.events,
      (events, previous) => {
        events.slice(previous.length).forEach(this.isolate(listener));
      }
    );
  }

  onStageChange(listener: (stage: TStage, previous: TStage) => void): Unsubscribe {
    return this.store.subscribe((state) => state.stage, this.isolate(listener));
  }

  onSuccess(listener: (result: TResult) => void): Unsubscribe {
    const notify = this.isolate(listener);
    return this.store.subscribe(
      (state) => state.status,
      (status) => {
        const { outcome } = this.store.getState();
        if (status === "succeeded" && outcome?.ok) {
          notify(outcome.result);
        }
      }
    );
  }

  onError(listener: (message: string) => void): Unsubscribe {
    const notify = this.isolate(listener);
    return this.store.subscribe(
      (state) => state.status,
      (status) => {
        const { outcome } = this.store.getState();
        if (status === "failed" && outcome && !outcome.ok) {
          notify(outcome.error);
        }
      }
    );
  }

  /** Requests cancellation; honoured at the work's next cancellation point. */
  cancel(): void {
    this.controller.abort();
  }

  async run(): Promise<TaskOutcome<TResult>> {
    if (this.status !== "idle") {
      throw new Error(`Task "${this.name}" has already been started`);
    }
    this.store.setState({ status: "running" });

    let outcome: TaskOutcome<TResult>;
    try {
      outcome = { ok: true, result: await this.work(this.createContext()) };
    } catch (error) {
      outcome = { ok: false, error: describeError(error) };
    }

    this.store.setState(
      outcome.ok
        ? { stage: this.options.doneStage, outcome, status: "succeeded" }
        : { stage: this.options.failedStage, outcome, status: "failed" }
    );
    return outcome;
  }

  /** A throwing listener is logged; it never reaches `run()` or other listeners. */
  private isolate<TArgs extends unknown[]>(
    listener: (...args: TArgs) => void
  ): (...args: TArgs) => void {
    return (...args) => {
      try {
        listener(...args);
      } catch (error) {
        console.error("[Task Listener Error]", {
          task: this.name,
          error: describeError(error),
          timestamp: new Date().toISOString(),
        });
      }
    };
  }

  private createContext(): TaskContext<TStage> {
    const emit = (level: ProgressLevel, message: string) => {
      this.store.setState((state) => ({
        events: [
          ...state.events,
          { level, stage: state.stage, message, timestamp: Date.now() },
        ],
      }));
    };

    return {
      signal: this.controller.signal,
      enter: (stage, message) => {
        this.store.setState({ stage });
        if (message) {
          emit("info", message);
        }
      },
      progress: (message) => emit("info", message),
      warn: (message) => emit("warning", message),
      throwIfCancelled: () => {
        if (this.controller.signal.aborted) {
          throw new TaskCancelledError();
        }
      },
    };
  }
}
