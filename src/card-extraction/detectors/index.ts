export * from './field-detector';
export * from './detector-registry';
export { emailDetector } from './email.detector';
export { phoneDetector } from './phone.detector';
export { websiteDetector } from './website.detector';
export { nameDetector } from './name.detector';
export { titleDetector } from './title.detector';
export { companyDetector } from './company.detector';
