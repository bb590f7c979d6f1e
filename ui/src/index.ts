/**
 * Public entry point.
 */

export { Dropdown } from "./dropdown/dropdown.ts";
export type { DropdownDeps } from "./dropdown/dropdown.ts";
export { DropdownController, createDropdownController } from "./dropdown/controller.ts";
export type { ControllerDeps } from "./dropdown/controller.ts";
export { filterItems } from "./dropdown/source.ts";
export { DropdownConfigError, DropdownStateError, FetchFailure } from "./kernel/core/errors.ts";
export { createLogger } from "./kernel/system/log.ts";
export type { LoggerOptions } from "./kernel/system/log.ts";
export { computePopoverPosition } from "./kernel/ui/popover.ts";
export type { Placement, PopoverPosition } from "./kernel/ui/popover.ts";
export { injectDropdownStyles } from "./styles/theme.ts";
export type { Disposable, Logger, LogLevel, ManagedTimers } from "./kernel/types.ts";
export type {
  ControllerEvents,
  ControllerOptions,
  DataSource,
  DropdownOptions,
  DropdownRenderers,
  DropdownSnapshot,
  FetchPage,
  PageState,
  SelectionMode,
  SelectionState,
} from "./types.ts";
