import type { PipelineTask, ProgressEvent } from "@dubline/core";

const printEvent = ({ level, message }: ProgressEvent) => {
  if (level === "warning") {
    console.warn(message);
  } else {
    console.log(message);
  }
};

/** Prints a task's progress channel to the console while it runs. */
export const attachConsoleReporter = <TResult, TStage extends string>(
  task: PipelineTask<TResult, TStage>
) => {
  const unsubscribers = [
    task.onProgress(printEvent),
    task.onError((message) => console.error(`Error: ${message}`)),
  ];
  return () => unsubscribers.forEach((unsubscribe) => unsubscribe());
};
