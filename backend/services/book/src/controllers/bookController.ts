// backend/services/book/src/controllers/bookController.ts
// Barrel for the routes import; the handlers live in handlers/book.
export { get } from "../handlers/book/get";
export { create } from "../handlers/book/create";
export { update } from "../handlers/book/update";
export { remove } from "../handlers/book/remove";
