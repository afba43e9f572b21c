import { assign, setup, type SnapshotFrom } from "xstate";

import type { RunState, StopReason } from "../../types/sessionTypes";


type StartEvt = { type: "START" };
type ConnectedEvt = { type: "CONNECTED"; instrumentId: string };
type StopEvt = { type: "STOP" };
type TripEvt = { type: "TRIP"; message: string };
type FailEvt = { type: "FAIL"; error: Error };
type ClosedEvt = { type: "CLOSED" };

export type AcquisitionEvent = StartEvt | ConnectedEvt | StopEvt | TripEvt | FailEvt | ClosedEvt;

export type AcquisitionContext = {
   instrumentId?: string;
   stopReason?: StopReason;
   detail?: string;
};


/* ---------- XState machine ---------- */
/**
 * idle -> connecting -> running -> stoppingBy{User,Threshold,Error} -> idle
 * Transitions are one-way except the final CLOSED back to idle.
 */
export const acquisitionMachine = setup({
   types: {
      context: {} as AcquisitionContext,
      events: {} as AcquisitionEvent,
   },
   actions: {
      resetAction: assign(() => ({
         instrumentId: undefined,
         stopReason: undefined,
         detail: undefined,
      })),
      connectedAction: assign(({ event }) => ({
         instrumentId: (event as ConnectedEvt).instrumentId,
      })),
      userStopAction: assign(() => ({
         stopReason: "user" as const,
         detail: "Stop requested",
      })),
      tripAction: assign(({ event }) => ({
         stopReason: "threshold" as const,
         detail: (event as TripEvt).message,
      })),
      failAction: assign(({ event }) => ({
         stopReason: "error" as const,
         detail: (event as FailEvt).error.message,
      })),
   },
}).createMachine({
   id: "acquisition",
   initial: "idle",
   context: {},
   states: {
      idle: {
         on: { START: { target: "connecting", actions: "resetAction" } },
      },
      connecting: {
         on: {
            CONNECTED: { target: "running", actions: "connectedAction" },
            STOP: { target: "stoppingByUser", actions: "userStopAction" },
            FAIL: { target: "stoppingByError", actions: "failAction" },
         },
      },
      running: {
         on: {
            STOP: { target: "stoppingByUser", actions: "userStopAction" },
            TRIP: { target: "stoppingByThreshold", actions: "tripAction" },
            FAIL: { target: "stoppingByError", actions: "failAction" },
         },
      },
      stoppingByUser: { on: { CLOSED: "idle" } },
      stoppingByThreshold: { on: { CLOSED: "idle" } },
      stoppingByError: { on: { CLOSED: "idle" } },
   },
});

export type AcquisitionSnapshot = SnapshotFrom<typeof acquisitionMachine>;

const RUN_STATES: readonly RunState[] = [
   "idle",
   "connecting",
   "running",
   "stoppingByUser",
   "stoppingByThreshold",
   "stoppingByError",
];

export const runStateOf = (snap: AcquisitionSnapshot): RunState =>
   RUN_STATES.find((s) => snap.matches(s)) ?? "idle";

export const isStopping = (state: RunState): boolean => state.startsWith("stopping");
