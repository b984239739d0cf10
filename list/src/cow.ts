/**
 * Copy-on-write bookkeeping.
 *
 * Every handle points at a share record counting the handles that hold the same chain.
 * A handle may relink or overwrite nodes only while it is the sole holder (`$_holders === 1`).
 * Handles collected without ever leaving their record give their slot back through
 * a FinalizationRegistry, so the count only errs on the side of cloning.
 */

/**
 * Opaque identity token stamped on positions; compared by reference only
 */
export type Generation = object;

export type Share = {
    $_holders: number;
};

const shareRegistry = new FinalizationRegistry<Share>((share: Share) => {
    share.$_holders--;
});

export const createGeneration = (): Generation => ({});

export const createShare = (): Share => ({ $_holders: 1 });

/**
 * Record `holder` as a holder of `share` until it is collected or calls `leaveShare`
 */
export const joinShare = (holder: object, share: Share): void => {
    shareRegistry.register(holder, share, holder);
};

/**
 * Add one more holder to an already joined share (used by copies)
 */
export const retainShare = (holder: object, share: Share): void => {
    share.$_holders++;
    joinShare(holder, share);
};

export const leaveShare = (holder: object, share: Share): void => {
    shareRegistry.unregister(holder);
    share.$_holders--;
};

export const isShared = (share: Share): boolean => share.$_holders > 1;
