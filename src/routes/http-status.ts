import { categoryOf, Category } from "../domain/error-codes.js";

export function httpStatusForCode(code: number): number {
  switch (categoryOf(code) * 100) {
    case Category.param:
      return 400;
    case Category.state:
      return 409;
    case Category.dependency:
      return 424;
    default:
      return 500;
  }
}
