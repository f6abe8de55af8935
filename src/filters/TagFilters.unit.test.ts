import { mockCreate, mockModify, mockNode, mockWay } from "../TestHelpers";
import { ObjectWithTagChangedFilter, TagValueInListFilter } from "./TagFilters";

describe("TagValueInListFilter", () => {
  const filter = new TagValueInListFilter("name", ["stupid", "dumb"]);

  it("explains itself", () => {
    expect(filter.explanation()).toBe(
      "Tag name changed to one of [stupid, dumb]",
    );
  });

  it("summarizes long value lists", () => {
    expect(
      new TagValueInListFilter("shop", [
        "a",
        "b",
        "c",
        "d",
        "e",
      ]).explanation(),
    ).toBe("Tag shop changed to one of [a, b, c] and 2 more");
  });

  it("matches a tag changing to a watched value", () => {
    const action = mockModify(mockNode({ tags: { name: "ok" } }), {
      tags: { name: "dumb" },
    });
    expect(filter.matches(action)).toBe(true);
  });

  it("matches a tag appearing with a watched value", () => {
    const node = mockNode({ tags: { name: "stupid" } });
    expect(filter.matches(mockCreate(node))).toBe(true);
    expect(
      filter.matches(
        mockModify(mockNode({ tags: {} }), { tags: { name: "stupid" } }),
      ),
    ).toBe(true);
  });

  it("does not match a watched value that stayed the same", () => {
    const action = mockModify(mockNode({ tags: { name: "dumb" } }), {
      version: 2,
    });
    expect(filter.matches(action)).toBe(false);
  });

  it("does not match other values or removed tags", () => {
    expect(
      filter.matches(
        mockModify(mockNode({ tags: { name: "dumb" } }), {
          tags: { name: "fine" },
        }),
      ),
    ).toBe(false);
    expect(
      filter.matches(
        mockModify(mockNode({ tags: { name: "dumb" } }), { tags: {} }),
      ),
    ).toBe(false);
    expect(
      filter.matches({
        kind: "delete",
        old: mockNode({ tags: { name: "dumb" } }),
      }),
    ).toBe(false);
  });

  it("does not treat inherited object properties as tags", () => {
    const prototypeFilter = new TagValueInListFilter("toString", ["x"]);
    expect(prototypeFilter.matches(mockCreate(mockNode()))).toBe(false);
  });
});

describe("ObjectWithTagChangedFilter", () => {
  const filter = new ObjectWithTagChangedFilter("highway", "motorway");

  it("explains itself", () => {
    expect(filter.explanation()).toBe(
      "Object with tag highway=motorway changed",
    );
  });

  it("matches edits to objects carrying the tag", () => {
    const way = mockWay(
      [
        [1, 0, 0],
        [2, 1, 1],
      ],
      { tags: { highway: "motorway" } },
    );
    const retagged = mockModify(way, { tags: { highway: "trunk" } });
    expect(filter.matches(retagged)).toBe(true);
    expect(filter.matches(mockModify(way, { version: 2 }))).toBe(true);
  });

  it("matches deletion of objects carrying the tag", () => {
    expect(
      filter.matches({
        kind: "delete",
        old: mockNode({ tags: { highway: "motorway" } }),
        new: mockNode({ visible: false, tags: {} }),
      }),
    ).toBe(true);
    expect(
      filter.matches({
        kind: "delete",
        old: mockNode({ tags: { highway: "motorway" } }),
      }),
    ).toBe(true);
  });

  it("matches creation of objects with the tag", () => {
    expect(
      filter.matches(mockCreate(mockNode({ tags: { highway: "motorway" } }))),
    ).toBe(true);
  });

  it("does not match objects gaining the tag through an edit", () => {
    const action = mockModify(mockNode({ tags: { highway: "trunk" } }), {
      tags: { highway: "motorway" },
    });
    expect(filter.matches(action)).toBe(false);
  });

  it("does not match identical old and new objects", () => {
    const node = mockNode({ tags: { highway: "motorway" } });
    const action = { kind: "modify" as const, old: node, new: { ...node } };
    expect(filter.matches(action)).toBe(false);
  });

  it("does not match objects without the tag", () => {
    const node = mockNode({ tags: { highway: "trunk" } });
    expect(filter.matches(mockCreate(node))).toBe(false);
  });
});
