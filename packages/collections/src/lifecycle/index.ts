export { attachmentLifecycle, type AttachmentState } from "./attachmentLifecycle.js";
