import { EVENT_STREAMS, LedgerError, type Product, type RegisterProductInput } from "@provenance/shared";
import type { VersionedProduct } from "../storage/ledger-store.js";
import { authorize, canWrite, type CallAuthorizer } from "./authorization.js";
import type { LedgerContext } from "./context.js";
import { validateRegistration } from "./validation.js";

export function loadProduct(ctx: LedgerContext, productId: string): VersionedProduct {
  const stored = ctx.store.getProduct(productId);
  if (!stored) {
    throw new LedgerError("not_found", `Product '${productId}' does not exist`);
  }
  return stored;
}

/** Whole-record write guarded by the version read in the same operation. */
export function saveProduct(ctx: LedgerContext, product: Product, expectedVersion: number): void {
  if (!ctx.store.updateProduct(product, expectedVersion)) {
    throw new LedgerError("conflict", `Product '${product.id}' changed concurrently`);
  }
}

export function registerProduct(
  ctx: LedgerContext,
  call: CallAuthorizer,
  input: RegisterProductInput,
): Product {
  const issues = validateRegistration(input);
  if (issues.length > 0) {
    throw new LedgerError("invalid_input", "Product registration is invalid", issues);
  }

  return ctx.store.transaction(() => {
    if (ctx.store.getProduct(input.id)) {
      throw new LedgerError("duplicate_id", `Product '${input.id}' already exists`);
    }
    authorize(ctx, call, input.owner);

    const product: Product = {
      id: input.id,
      name: input.name,
      origin: input.origin,
      description: input.description ?? "",
      category: input.category ?? "",
      tags: [...(input.tags ?? [])],
      certifications: [...(input.certifications ?? [])],
      mediaHashes: [...(input.mediaHashes ?? [])],
      custom: { ...(input.custom ?? {}) },
      owner: input.owner,
      createdAt: ctx.now().toISOString(),
      active: true,
      authorizedActors: [input.owner],
    };

    if (!ctx.store.insertProduct(product)) {
      throw new LedgerError("duplicate_id", `Product '${input.id}' already exists`);
    }
    for (const stream of EVENT_STREAMS) {
      if (!ctx.store.initEventHead(product.id, stream)) {
        throw new LedgerError("conflict", `${stream} history for '${product.id}' already initialised`);
      }
    }

    ctx.logger.info({ productId: product.id, owner: product.owner }, "product registered");
    return product;
  });
}

export function getProduct(ctx: LedgerContext, productId: string): Product {
  return loadProduct(ctx, productId).product;
}

export function isAuthorized(ctx: LedgerContext, productId: string, actor: string): boolean {
  return canWrite(loadProduct(ctx, productId).product, actor);
}
