export { tenants, onboardingStateEnum } from "./tenants.js";
export { tenantCredentials, embeddingProviderEnum } from "./credentials.js";
export { validationEvents } from "./validation-events.js";
export { uploadedFiles, uploadStatusEnum } from "./uploaded-files.js";
