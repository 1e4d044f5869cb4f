export * from "./schema/classifier_params_v1";
export * from "./schema/coverage_table_v1";
export * from "./schema/gene_class_v1";
export * from "./schema/classifier_run_v1";
