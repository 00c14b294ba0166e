import type { ClassValue } from "clsx";
import { cn } from "./utils";

/** Collects class fragments in order; `build` resolves them through `cn`. */
export class ClassBuilder {
  private readonly fragments: ClassValue[] = [];

  append(...values: ClassValue[]): this {
    this.fragments.push(...values);
    return this;
  }

  build(): string {
    return cn(...this.fragments);
  }
}
