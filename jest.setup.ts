import dotenv from "dotenv";
dotenv.config();

process.env.CI = "true";
process.env.NODE_ENV = "test";

afterEach(() => {
  jest.clearAllMocks();
});
