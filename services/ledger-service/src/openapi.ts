export function buildOpenApiSpec(serviceBaseUrl: string) {
  return {
    openapi: "3.0.3",
    info: {
      title: "Provenance Ledger Service API",
      version: "0.1.0",
      description: "Append-only product custody ledger: registration, signed event appends, ownership and access governance.",
    },
    servers: [{ url: serviceBaseUrl }],
    paths: {
      "/health": {
        get: {
          summary: "Health check",
          responses: {
            "200": { description: "Service healthy" },
          },
        },
      },
      "/products": {
        post: {
          summary: "Register a product (signed by the owner)",
          responses: {
            "201": { description: "Product registered" },
            "400": { description: "Invalid request" },
            "401": { description: "Call not signed by owner" },
            "409": { description: "Duplicate product id" },
          },
        },
      },
      "/products/{productId}": {
        get: {
          summary: "Get product by ID",
          parameters: [
            { in: "path", name: "productId", required: true, schema: { type: "string" } },
          ],
          responses: {
            "200": { description: "Product found" },
            "404": { description: "Product not found" },
          },
        },
      },
      "/products/{productId}/events": {
        post: {
          summary: "Append one tracking event (signed by the actor)",
          parameters: [
            { in: "path", name: "productId", required: true, schema: { type: "string" } },
          ],
          responses: {
            "201": { description: "Event appended" },
            "400": { description: "Invalid event" },
            "401": { description: "Call not signed by actor" },
            "403": { description: "Actor not authorized" },
            "404": { description: "Product not found" },
            "409": { description: "Product inactive" },
          },
        },
      },
      "/products/{productId}/events/batch": {
        post: {
          summary: "Append a batch of events atomically",
          parameters: [
            { in: "path", name: "productId", required: true, schema: { type: "string" } },
          ],
          responses: {
            "201": { description: "Batch appended" },
            "400": { description: "Invalid batch" },
            "403": { description: "Actor not authorized" },
            "404": { description: "Product not found" },
            "413": { description: "Batch too large" },
          },
        },
      },
      "/products/{productId}/events/search": {
        get: {
          summary: "Filter and page a product's events",
          parameters: [
            { in: "path", name: "productId", required: true, schema: { type: "string" } },
          ],
          responses: {
            "200": { description: "Event page" },
            "404": { description: "Product not found" },
          },
        },
      },
      "/products/{productId}/events/{sequence}": {
        get: {
          summary: "Get one event by sequence",
          parameters: [
            { in: "path", name: "productId", required: true, schema: { type: "string" } },
            { in: "path", name: "sequence", required: true, schema: { type: "string" } },
          ],
          responses: {
            "200": { description: "Event found" },
            "404": { description: "Product or event not found" },
          },
        },
      },
      "/products/{productId}/event-count": {
        get: {
          summary: "Count events, optionally by type",
          parameters: [
            { in: "path", name: "productId", required: true, schema: { type: "string" } },
          ],
          responses: {
            "200": { description: "Event count" },
            "404": { description: "Product not found" },
          },
        },
      },
      "/products/{productId}/verify": {
        get: {
          summary: "Verify the hash chain of one event stream",
          parameters: [
            { in: "path", name: "productId", required: true, schema: { type: "string" } },
            {
              in: "query",
              name: "stream",
              required: false,
              schema: { type: "string", enum: ["custody", "governance"], default: "custody" },
            },
          ],
          responses: {
            "200": { description: "Verification result" },
            "400": { description: "Unknown stream" },
            "404": { description: "Product not found" },
          },
        },
      },
      "/products/{productId}/governance": {
        get: {
          summary: "Read ownership, access and activity changes in order",
          parameters: [
            { in: "path", name: "productId", required: true, schema: { type: "string" } },
            { in: "query", name: "from", required: false, schema: { type: "integer", minimum: 0 } },
            { in: "query", name: "to", required: false, schema: { type: "integer", minimum: 0 } },
          ],
          responses: {
            "200": { description: "Governance events" },
            "404": { description: "Product not found" },
          },
        },
      },
      "/products/{productId}/actors/{actor}": {
        get: {
          summary: "Check whether an identity may append events",
          parameters: [
            { in: "path", name: "productId", required: true, schema: { type: "string" } },
            { in: "path", name: "actor", required: true, schema: { type: "string" } },
          ],
          responses: {
            "200": { description: "Authorization result" },
            "404": { description: "Product not found" },
          },
        },
      },
      "/products/{productId}/transfer": {
        post: {
          summary: "Transfer ownership (signed by the current owner)",
          parameters: [
            { in: "path", name: "productId", required: true, schema: { type: "string" } },
          ],
          responses: {
            "200": { description: "Ownership transferred" },
            "403": { description: "Caller is not the owner" },
            "404": { description: "Product not found" },
          },
        },
      },
      "/products/{productId}/actors": {
        post: {
          summary: "Grant write access (owner only, idempotent)",
          parameters: [
            { in: "path", name: "productId", required: true, schema: { type: "string" } },
          ],
          responses: {
            "200": { description: "Access granted or already present" },
            "403": { description: "Caller is not the owner" },
            "404": { description: "Product not found" },
          },
        },
      },
      "/products/{productId}/actors/remove": {
        post: {
          summary: "Revoke write access (owner only, idempotent)",
          parameters: [
            { in: "path", name: "productId", required: true, schema: { type: "string" } },
          ],
          responses: {
            "200": { description: "Access revoked or already absent" },
            "403": { description: "Caller is not the owner" },
            "404": { description: "Product not found" },
          },
        },
      },
      "/products/{productId}/active": {
        post: {
          summary: "Deactivate or reactivate a product (owner only)",
          parameters: [
            { in: "path", name: "productId", required: true, schema: { type: "string" } },
          ],
          responses: {
            "200": { description: "Activity updated" },
            "403": { description: "Caller is not the owner" },
            "404": { description: "Product not found" },
          },
        },
      },
      "/event-types": {
        get: {
          summary: "List event type labels",
          responses: {
            "200": { description: "Event types" },
          },
        },
        post: {
          summary: "Register an event type label (governance role)",
          responses: {
            "201": { description: "Event type registered" },
            "400": { description: "Invalid tag or label" },
            "403": { description: "Role not allowed" },
          },
        },
      },
    },
  };
}
