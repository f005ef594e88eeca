export { ServiceLifecycle } from "./lifecycle";
export { ServiceState } from "./types";
