import { RuleTester } from "@typescript-eslint/rule-tester";
import { afterAll, describe, it } from "vitest";
import { requireField } from "./require-field.ts";

// Wire RuleTester to vitest
RuleTester.afterAll = afterAll;
RuleTester.describe = describe;
RuleTester.it = it;
RuleTester.itOnly = it.only;

const tester = new RuleTester();

tester.run("require-field", requireField, {
  valid: [
    // Every public property decorated
    {
      code: `
        import { Struct, field } from "fieldpath";

        class Inner extends Struct {
          @field("double") x = 3.14;
          @field("integer") y = 42n;
        }
      `,
    },
    // Private, protected, static and #private properties are ignored
    {
      code: `
        import { Struct, field } from "fieldpath";

        class Inner extends Struct {
          @field("integer") y = 42n;
          private cache = 1;
          protected hint = "h";
          static instances = 0;
          #secret = 2;
        }
      `,
    },
    // declare properties are ignored
    {
      code: `
        import { Struct, field } from "fieldpath";

        class Inner extends Struct {
          @field("integer") y = 42n;
          declare tag: string;
        }
      `,
    },
    // Methods and getters are not properties
    {
      code: `
        import { Struct, field } from "fieldpath";

        class Inner extends Struct {
          @field("integer") y = 42n;
          get doubled() { return this.y * 2n; }
          reset() { this.y = 0n; }
        }
      `,
    },
    // Class not extending Struct — no check
    {
      code: `
        import { Struct } from "fieldpath";

        class Plain {
          x = 1;
        }
      `,
    },
    // No Struct import — no check
    {
      code: `
        class Inner extends Struct {
          x = 1;
        }
      `,
    },
    // Struct from another package — no check
    {
      code: `
        import { Struct } from "elsewhere";

        class Inner extends Struct {}
      `,
    },
  ],

  invalid: [
    // No fields at all
    {
      code: `
        import { Struct } from "fieldpath";

        class Empty extends Struct {}
      `,
      errors: [{ messageId: "emptyStruct", data: { className: "Empty" } }],
    },
    // Only private members still counts as empty
    {
      code: `
        import { Struct } from "fieldpath";

        class Hidden extends Struct {
          private count = 0;
        }
      `,
      errors: [{ messageId: "emptyStruct", data: { className: "Hidden" } }],
    },
    // Undecorated public property
    {
      code: `
        import { Struct, field } from "fieldpath";

        class Inner extends Struct {
          @field("double") x = 3.14;
          y = 42n;
        }
      `,
      errors: [
        {
          messageId: "missingDecorator",
          data: { name: "y", className: "Inner" },
        },
      ],
    },
    // Undecorated and no fields: both reported, in source order
    {
      code: `
        import { Struct } from "fieldpath";

        class Inner extends Struct {
          public y = 42n;
        }
      `,
      errors: [
        { messageId: "emptyStruct", data: { className: "Inner" } },
        {
          messageId: "missingDecorator",
          data: { name: "y", className: "Inner" },
        },
      ],
    },
    // Renamed import — rule tracks local name
    {
      code: `
        import { Struct as Base } from "fieldpath";

        class Empty extends Base {}
      `,
      errors: [{ messageId: "emptyStruct", data: { className: "Empty" } }],
    },
  ],
});
