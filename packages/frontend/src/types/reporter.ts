/**
 * Progress reporting
 *
 * Operations never write to the console themselves; they emit events to the
 * reporter they were given.
 */

export type BuildEvent =
  | { readonly kind: "visit"; readonly path: string; readonly depth: number }
  | {
      readonly kind: "resolve";
      readonly moduleName: string;
      readonly requiredBy: string;
      readonly resolvedPath: string;
    }
  | {
      readonly kind: "skip-builtin";
      readonly moduleName: string;
      readonly requiredBy: string;
    }
  | { readonly kind: "merge-explicit"; readonly path: string }
  | { readonly kind: "bundle-written"; readonly outputPath: string }
  | {
      readonly kind: "engine-invoked";
      readonly engine: string;
      readonly command: readonly string[];
    };

export type Reporter = {
  readonly report: (event: BuildEvent) => void;
};

export const silentReporter: Reporter = {
  report: () => undefined,
};

/**
 * Reporter that records every event, in order
 */
export const createRecordingReporter = (): Reporter & {
  readonly events: readonly BuildEvent[];
} => {
  const events: BuildEvent[] = [];
  return {
    events,
    report: (event) => {
      events.push(event);
    },
  };
};
