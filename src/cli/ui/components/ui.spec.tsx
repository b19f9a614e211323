/**
 * @file Minimal happy-path specs for UI primitives
 */
import { Box, Text } from "ink";
import { Title, Hint, SymbolTable, columnWidth } from "./ui";

describe("ui primitives", () => {
  test("Title stacks a cyan label over gray subtitles", () => {
    const el = Title({ label: "Color", subtitle: "int16" });
    expect(el.type).toBe(Box);
    expect(el.props.flexDirection).toBe("column");
    const [label, subs] = el.props.children;
    expect(label.type).toBe(Text);
    expect(label.props).toEqual({ color: "cyan", children: "Color" });
    expect(subs).toHaveLength(1);
    expect(subs[0].props).toEqual({ color: "gray", children: "int16" });
  });

  test("Title without a subtitle renders no subtitle lines", () => {
    const el = Title({ label: "Access" });
    expect(el.props.children[1]).toEqual([]);
  });

  test("columnWidth covers the header and the longest name", () => {
    expect(columnWidth([], "Symbol")).toBe(6);
    expect(columnWidth([{ name: "Red", value: "1" }, { name: "HttpsAndHttp", value: '"https,http"' }], "Symbol")).toBe(12);
  });

  test("an empty table renders a hint", () => {
    const el = SymbolTable({ rows: [] });
    expect(el.type).toBe(Hint);
    expect(el.props.children).toBe("(no symbols)");
  });

  test("Hint is gray text", () => {
    const el = Hint({ children: "nothing here" });
    expect(el.type).toBe(Text);
    expect(el.props.color).toBe("gray");
  });
});
