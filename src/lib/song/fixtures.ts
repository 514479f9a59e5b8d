import type { SongInput } from "./song-types"

export const testSongInput: SongInput = {
  title: "Test Song",
  artist: "Test Artist",
  key: "G",
  capo: 2,
  tempo: 92,
  difficulty: "Beginner",
  structure: ["intro", "verse1", "chorus"],
  sections: [
    { type: "Intro", barProgression: "|G|G|C|C|" },
    { type: "Verse", label: "Verse 1", content: "[G]Hello [C]World\n\nPlain line" },
    { type: "Chorus", content: "[D]Sing [Xyz]it", repeat: 2 },
  ],
}
