export * from "./filterSpec";
export * from "./indexRecord";
