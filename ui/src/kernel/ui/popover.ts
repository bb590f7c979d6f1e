/**
 * Popover layer: dropdown overlays rendered at document root level.
 *
 * z-index 1000. One popover per owner: showing a new one dismisses the
 * previous. The panel opens below its anchor and flips above when the
 * space below is too small and the space above is not.
 */

import type { Disposable, ManagedTimers } from "../types.ts";

export interface PopoverOptions {
  anchor: HTMLElement;
  content: HTMLElement;
  /** Panel height in px, used both for sizing and the flip decision. */
  height: number;
  /** Called once when the popover goes away for any reason. */
  onDismiss?: () => void;
}

export type Placement = "above" | "below";

export interface PopoverPosition {
  placement: Placement;
  top: number;
  left: number;
  width: number;
}

/** Track active popovers per owner (one at a time). */
const activePopovers = new Map<string, Disposable>();

export const POPOVER_GAP = 6;

/**
 * Pure placement math. Flips above only when the panel does not fit below
 * AND there is more than a panel's height above the anchor.
 */
export function computePopoverPosition(
  anchorRect: Pick<DOMRect, "top" | "bottom" | "left" | "width">,
  height: number,
  viewportHeight: number,
): PopoverPosition {
  const spaceBelow = viewportHeight - anchorRect.bottom;
  const showAbove = spaceBelow < height && anchorRect.top > height;
  return {
    placement: showAbove ? "above" : "below",
    top: showAbove ? anchorRect.top - height - POPOVER_GAP : anchorRect.bottom + POPOVER_GAP,
    left: anchorRect.left,
    width: anchorRect.width,
  };
}

export class PopoverManager {
  constructor(private readonly timers: ManagedTimers) {}

  showPopover(owner: string, options: PopoverOptions): Disposable {
    activePopovers.get(owner)?.dispose();

    const wrapper = document.createElement("div");
    wrapper.className = "dropdown-popover";
    wrapper.dataset["popoverOwner"] = owner;
    wrapper.style.cssText = `position:fixed;z-index:1000;height:${options.height}px;`;
    wrapper.appendChild(options.content);
    document.body.appendChild(wrapper);

    const reposition = () => {
      const pos = computePopoverPosition(options.anchor.getBoundingClientRect(), options.height, window.innerHeight);
      wrapper.dataset["placement"] = pos.placement;
      wrapper.style.top = `${pos.top}px`;
      wrapper.style.left = `${pos.left}px`;
      wrapper.style.width = `${pos.width}px`;
    };
    reposition();

    const onScroll = () => reposition();
    const onResize = () => reposition();
    window.addEventListener("scroll", onScroll, { capture: true, passive: true });
    window.addEventListener("resize", onResize, { passive: true });

    let disposed = false;

    // Click-outside dismissal, armed a frame later so the opening click doesn't close it.
    let clickOutsideHandler: ((e: MouseEvent) => void) | null = null;
    const arm = this.timers.requestAnimationFrame(() => {
      if (disposed) return;
      clickOutsideHandler = (e: MouseEvent) => {
        const target = e.target;
        if (!(target instanceof Node)) return;
        if (!wrapper.contains(target) && !options.anchor.contains(target)) {
          popover.dispose();
        }
      };
      document.addEventListener("click", clickOutsideHandler, { capture: true });
    });

    const onEscape = (e: KeyboardEvent) => {
      if (e.key === "Escape") popover.dispose();
    };
    document.addEventListener("keydown", onEscape);

    const popover: Disposable = {
      dispose: () => {
        if (disposed) return;
        disposed = true;
        arm.dispose();
        wrapper.remove();
        window.removeEventListener("scroll", onScroll, { capture: true });
        window.removeEventListener("resize", onResize);
        if (clickOutsideHandler) {
          document.removeEventListener("click", clickOutsideHandler, { capture: true });
        }
        document.removeEventListener("keydown", onEscape);
        if (activePopovers.get(owner) === popover) {
          activePopovers.delete(owner);
        }
        options.onDismiss?.();
      },
    };

    activePopovers.set(owner, popover);
    return popover;
  }
}
