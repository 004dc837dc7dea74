import {
  canonicalJson,
  LedgerError,
  type GovernanceChangeResponse,
  type GovernanceEventType,
  type Product,
  type TrackingEvent,
} from "@provenance/shared";
import { authorize, checkOwner, type CallAuthorizer } from "./authorization.js";
import type { LedgerContext } from "./context.js";
import { appendEvents } from "./events.js";
import { loadProduct, saveProduct } from "./registry.js";
import { validateIdentity } from "./validation.js";

export type GovernanceChange = GovernanceChangeResponse;

function requireIdentity(value: string, field: string): void {
  const issues = validateIdentity(value, field);
  if (issues.length > 0) {
    throw new LedgerError("invalid_input", `${field} is not a valid identity`, issues);
  }
}

/** Written to the product's governance stream; custody sequences are untouched. */
function recordGovernance(
  ctx: LedgerContext,
  product: Product,
  actor: string,
  eventType: GovernanceEventType,
  details: Record<string, unknown>,
): TrackingEvent {
  const [event] = appendEvents(ctx, product.id, "governance", actor, [
    { eventType, location: "", metadata: canonicalJson(details), dataHash: null, note: "" },
  ]);
  return event;
}

export function transferOwnership(
  ctx: LedgerContext,
  call: CallAuthorizer,
  productId: string,
  currentOwner: string,
  newOwner: string,
): GovernanceChange {
  return ctx.store.transaction(() => {
    const { product, version } = loadProduct(ctx, productId);
    authorize(ctx, call, currentOwner);
    checkOwner(product, currentOwner);
    requireIdentity(newOwner, "newOwner");
    if (newOwner === currentOwner) {
      throw new LedgerError("invalid_input", "newOwner already owns the product", [
        { field: "newOwner", message: "must differ from the current owner" },
      ]);
    }

    const event = recordGovernance(ctx, product, currentOwner, "OWNERSHIP_TRANSFER", {
      from: currentOwner,
      to: newOwner,
    });

    const actors = product.authorizedActors.filter((actor) => actor !== currentOwner);
    if (!actors.includes(newOwner)) actors.push(newOwner);
    const updated: Product = { ...product, owner: newOwner, authorizedActors: actors };
    saveProduct(ctx, updated, version);

    ctx.logger.info({ productId, from: currentOwner, to: newOwner }, "ownership transferred");
    return { product: updated, changed: true, event };
  });
}

/** Idempotent: granting an already listed actor succeeds with `changed: false`. */
export function addAuthorizedActor(
  ctx: LedgerContext,
  call: CallAuthorizer,
  productId: string,
  owner: string,
  actor: string,
): GovernanceChange {
  return ctx.store.transaction(() => {
    const { product, version } = loadProduct(ctx, productId);
    authorize(ctx, call, owner);
    checkOwner(product, owner);
    requireIdentity(actor, "actor");

    if (product.authorizedActors.includes(actor)) {
      return { product, changed: false };
    }

    const event = recordGovernance(ctx, product, owner, "ACCESS_GRANTED", { actor });
    const updated: Product = { ...product, authorizedActors: [...product.authorizedActors, actor] };
    saveProduct(ctx, updated, version);

    ctx.logger.info({ productId, actor }, "actor authorized");
    return { product: updated, changed: true, event };
  });
}

/** Idempotent: revoking an absent actor succeeds with `changed: false`. */
export function removeAuthorizedActor(
  ctx: LedgerContext,
  call: CallAuthorizer,
  productId: string,
  owner: string,
  actor: string,
): GovernanceChange {
  return ctx.store.transaction(() => {
    const { product, version } = loadProduct(ctx, productId);
    authorize(ctx, call, owner);
    checkOwner(product, owner);
    requireIdentity(actor, "actor");

    if (!product.authorizedActors.includes(actor)) {
      return { product, changed: false };
    }

    const event = recordGovernance(ctx, product, owner, "ACCESS_REVOKED", { actor });
    const updated: Product = {
      ...product,
      authorizedActors: product.authorizedActors.filter((existing) => existing !== actor),
    };
    saveProduct(ctx, updated, version);

    ctx.logger.info({ productId, actor }, "actor revoked");
    return { product: updated, changed: true, event };
  });
}

export function setProductActive(
  ctx: LedgerContext,
  call: CallAuthorizer,
  productId: string,
  owner: string,
  active: boolean,
): GovernanceChange {
  return ctx.store.transaction(() => {
    const { product, version } = loadProduct(ctx, productId);
    authorize(ctx, call, owner);
    checkOwner(product, owner);

    if (product.active === active) {
      return { product, changed: false };
    }

    const event = recordGovernance(
      ctx,
      product,
      owner,
      active ? "PRODUCT_REACTIVATED" : "PRODUCT_DEACTIVATED",
      { active },
    );
    const updated: Product = { ...product, active };
    saveProduct(ctx, updated, version);

    ctx.logger.info({ productId, active }, "product activity changed");
    return { product: updated, changed: true, event };
  });
}
