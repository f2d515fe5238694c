export { authMiddleware } from "./auth.js";
