import { setupServer } from "msw/node";
import { handlers } from "./handlers.js";

/**
 * MSW server for intercepting outbound HTTP requests during tests.
 * Tests that talk to external APIs start it themselves; route tests use
 * supertest against local apps and leave it off.
 */
export const server = setupServer(...handlers);
