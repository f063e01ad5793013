export {
  createSignalChannel,
  type SignalChannel,
  type SignalWaitResult,
} from "./signalChannel.js";
export {
  createRefreshCoordinator,
  type ActivationState,
  type RefreshActivation,
  type RefreshCoordinator,
  type RefreshCoordinatorOptions,
  type RefreshTarget,
} from "./refreshCoordinator.js";
