import { ConfigReader } from "@backstage/config";
import { MissingVariablesError } from "./errors";
import {
  ConfigVariablesSource,
  StaticVariablesSource,
  inspectVariables,
  readConfigVariables,
  replaceVariables,
} from "./variables";

// ============================================================================
// inspectVariables Tests
// ============================================================================

describe("inspectVariables", () => {
  it("should list each variable once in order of appearance", () => {
    const text = "a: ${ B }\nb: ${A}\nc: ${B}-${ C_1 }\n";
    expect(inspectVariables(text)).toEqual(["B", "A", "C_1"]);
  });

  it("should accept spaces on either side of the name", () => {
    expect(inspectVariables("${A} ${ B} ${ C} ${ D }")).toEqual(["A", "B", "C", "D"]);
    expect(inspectVariables("${A} ${A } ${A}")).toEqual(["A"]);
  });

  it("should return an empty list when there are no variables", () => {
    expect(inspectVariables("kind: ConfigMap\n")).toEqual([]);
  });

  it("should ignore lowercase names", () => {
    expect(inspectVariables("a: ${lower}\n")).toEqual([]);
  });
});

// ============================================================================
// replaceVariables Tests
// ============================================================================

describe("replaceVariables", () => {
  it("should replace every occurrence, with or without spaces", () => {
    const source = new StaticVariablesSource({ REGION: "eu-west-1" });
    expect(
      replaceVariables("a: ${REGION}\nb: ${ REGION }\n", ["REGION"], source),
    ).toBe("a: eu-west-1\nb: eu-west-1\n");
  });

  it("should be a plain find and replace", () => {
    const source = new StaticVariablesSource({ BAR: "bar" });
    expect(replaceVariables("foo ${ BAR }", ["BAR"], source)).toBe("foo bar");
  });

  it("should insert values literally", () => {
    const source = new StaticVariablesSource({ PRICE: "$& $1" });
    expect(replaceVariables("p: ${PRICE}", ["PRICE"], source)).toBe(
      "p: $& $1",
    );
  });

  it("should accept empty values", () => {
    const source = new StaticVariablesSource({ EMPTY: "" });
    expect(replaceVariables("v: '${EMPTY}'", ["EMPTY"], source)).toBe("v: ''");
  });

  it("should report every missing variable", () => {
    const source = new StaticVariablesSource({ B: "b" });
    const text = "${A} ${B} ${C}";

    expect(() => replaceVariables(text, ["A", "B", "C"], source)).toThrow(
      MissingVariablesError,
    );
    try {
      replaceVariables(text, ["A", "B", "C"], source);
    } catch (error) {
      expect(error).toBeInstanceOf(MissingVariablesError);
      if (error instanceof MissingVariablesError) {
        expect(error.variables).toEqual(["A", "C"]);
        expect(error.message).toBe(
          "value for variables [A, C] is not set. Please set the value using os environment variables or the installer configuration",
        );
      }
    }
  });

  it("should match names literally", () => {
    const source = new StaticVariablesSource({ "A+B": "x", "A.B": "y" });
    expect(
      replaceVariables("${AB} ${AAB} ${A+B} ${AxB} ${A.B}", ["A+B", "A.B"], source),
    ).toBe("${AB} ${AAB} x ${AxB} y");
  });

  it("should leave variables that were not asked for", () => {
    const source = new StaticVariablesSource({ A: "1" });
    expect(replaceVariables("${A} ${B}", ["A"], source)).toBe("1 ${B}");
  });
});

// ============================================================================
// Variable Sources Tests
// ============================================================================

describe("StaticVariablesSource", () => {
  it("should return configured values", () => {
    const source = new StaticVariablesSource().withVariable("A", "1");
    expect(source.get("A")).toBe("1");
    expect(source.get("B")).toBeUndefined();
  });
});

describe("ConfigVariablesSource", () => {
  const config = new ConfigReader({
    providerInstaller: {
      variables: {
        REGION: "eu-west-1",
        EXP_1: true,
        REPLICAS: 3,
        NESTED: { ignored: "yes" },
      },
    },
  });

  it("should read values from the config", () => {
    const source = ConfigVariablesSource.fromConfig(config, {});
    expect(source.get("REGION")).toBe("eu-west-1");
    expect(source.get("EXP_1")).toBe("true");
    expect(source.get("REPLICAS")).toBe("3");
    expect(source.get("NESTED")).toBeUndefined();
    expect(source.get("MISSING")).toBeUndefined();
  });

  it("should prefer environment variables", () => {
    const source = ConfigVariablesSource.fromConfig(config, {
      REGION: "us-east-1",
    });
    expect(source.get("REGION")).toBe("us-east-1");
  });

  it("should read nothing without a variables section", () => {
    expect(readConfigVariables(new ConfigReader({}))).toEqual({});
  });
});
