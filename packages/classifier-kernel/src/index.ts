// @taxclass/classifier-kernel
// Entry point exports for the iterative gene classifier.

export * from "./errors";
export * from "./events";
export * from "./params";
export * from "./kernel";
export * from "./matrix/coverage_matrix";
export * from "./stats/sample_statistics";
export * from "./detection/gene_detection";
export * from "./detection/genome_detection";
export * from "./variability/adjusted_variability";
export * from "./rules/specificity";
export * from "./rules/core_accessory";
export * from "./rules/gene_class";
export * from "./loss/loss_function";
