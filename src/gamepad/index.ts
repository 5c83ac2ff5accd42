export { SubscriptionRegistry, DEFAULT_REGISTRY_SETTINGS } from "./registry";
export type { ConnectionState, RegistryOptions, RegistrySettings, Resolution, ShutdownOptions } from "./registry";
export { SurfaceSubscription, invokeSafely } from "./subscription";
export type { BoundHandler, ConnectHandler, DisconnectHandler } from "./subscription";
export { ModeDispatcher, DEFAULT_DIRECTIONAL_GAIN } from "./dispatcher";
export type { RouteLookup, RouteTarget } from "./dispatcher";
export { Poller, DEFAULT_POLL_INTERVAL_MS, MIN_POLL_INTERVAL_MS } from "./poller";
export { PriorityStack } from "./priorityStack";
export * from "./controls";
export * from "./signal";
export * from "./direction";
export type * from "../types";

export type * from "../device/adapter";
export { DeviceInfo, DEFAULT_VENDOR_NAME } from "../device/info";
export { classifyDevice, isVirtualDevice, DEFAULT_DEVICE_POLICY } from "../device/classify";
export type { Classification, DevicePolicy } from "../device/classify";
export { loadStyleTable, parseStyleTable, DEVICE_STYLES } from "../device/styles";
export type { DeviceStyle, StyleTable } from "../device/styles";
export { SimulatedAdapter, SimulatedDevice, SIMULATED_PRESETS } from "../device/simulated";
export type { SimulatedPreset } from "../device/simulated";

export { GamepadMenu, MenuNavigator, attachMenu, DPAD_MENU_USAGE, BUTTON_X_MENU_USAGE } from "../ui/menu";
export type { AttachMenuOptions, AttachedMenu, GamepadMenuItem, MenuStyle } from "../ui/menu";
export { buildHelpEntries, HELP_ORDER } from "../ui/help";
export type { HelpEntry, UsageFormatter } from "../ui/help";
