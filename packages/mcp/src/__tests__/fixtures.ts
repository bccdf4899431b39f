/** Four straight tiles at 120 BPM: floors hit at 0, 500, 1000, 1500 and 2000 ms. */
export function createLevelText(): string {
  return JSON.stringify(
    {
      angleData: [0, 0, 0, 0],
      settings: { bpm: 120, artist: "test" },
      actions: [
        { floor: 0, eventType: "SetHitsound", hitsound: "Kick" },
        {
          floor: 1,
          eventType: "MoveCamera",
          duration: 1,
          relativeTo: "Tile",
          position: [0, 0],
          zoom: 100,
          angleOffset: 0,
          ease: "Linear",
        },
        {
          floor: 3,
          eventType: "MoveCamera",
          duration: 2,
          relativeTo: "Tile",
          position: [10, 20],
          zoom: 200,
          angleOffset: 90,
          ease: "OutQuad",
        },
      ],
      decorations: [],
    },
    null,
    2,
  );
}

export function createEmptyLevelText(): string {
  return JSON.stringify({ pathData: "RRU", settings: { bpm: 100 }, actions: [] });
}
