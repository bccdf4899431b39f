export function createStraightLevelText(): string {
  return `\uFEFF{
  "angleData": [0, 0, 0, 0],
  "settings": { "version": 13, "bpm": 100, "offset": 0, },
  "actions": [
    { "floor": 1, "eventType": "MoveCamera", "duration": 1, "relativeTo": "Player", "position": [2, 3], "zoom": 150, "angleOffset": 10, "ease": "InQuad" },
    { "floor": 2, "eventType": "Twirl" },
    { "floor": 3, "eventType": "MoveCamera", "position": [null, 5], "ease": "Elastic", "elastic": { "oscillations": 4, "decay": 2 } },
    { "floor": 4, "eventType": "MoveCamera", "ease": "InOutFlash", "elastic": "bad", },
  ],
  "decorations": [],
}
`;
}

export function createTurningLevelJson(): string {
  return JSON.stringify({
    angleData: [0, 90],
    settings: { bpm: 100 },
    actions: [],
  });
}
