export * from "./WhoAmITool";
