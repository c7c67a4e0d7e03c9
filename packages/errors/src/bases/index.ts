export { ExternalError } from "./external-error.js";
export { IntegrityError } from "./integrity-error.js";
export { InternalError } from "./internal-error.js";
export { NotFoundError } from "./not-found-error.js";
export { ValidationError } from "./validation-error.js";
