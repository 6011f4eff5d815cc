import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { FontFamilyRecord } from "../types/font.types";

export const FIXTURE_DIR = join(fileURLToPath(new URL(".", import.meta.url)), "fixtures");

export const SNAPSHOT_PATH = join(FIXTURE_DIR, "snapshot.json");

/**
 * Small catalog of invented families
 */
export function sampleFamilies(): FontFamilyRecord[] {
  return [
    {
      name: "Harbor Sans",
      variants: [
        {
          name: "Regular",
          weight: 400,
          style: "normal",
          filename: "/fonts/HarborSans-Regular.ttf",
          properties: {
            copyright: "Copyright 2024 Example Foundry",
            win32FamilyNames: "Harbor Sans",
            fullName: "Harbor Sans Regular",
            postscriptName: "HarborSans-Regular",
            designer: { "en-US": "Sam Example", de: "Sam Beispiel" },
          },
        },
        {
          name: "Italic",
          weight: 400,
          style: "italic",
          filename: "/fonts/HarborSans-Italic.ttf",
          properties: { win32FamilyNames: "Harbor Sans", fullName: "Harbor Sans Italic" },
        },
        {
          name: "Bold",
          weight: 700,
          style: "normal",
          filename: "/fonts/HarborSans-Bold.ttf",
          properties: { win32FamilyNames: "Harbor Sans", fullName: "Harbor Sans Bold" },
        },
        {
          name: "Bold Italic",
          weight: 700,
          style: "italic",
          filename: "/fonts/HarborSans-BoldItalic.ttf",
          properties: { win32FamilyNames: "Harbor Sans", fullName: "Harbor Sans Bold Italic" },
        },
        {
          name: "Condensed",
          weight: 400,
          style: "normal",
          width: 3,
          filename: "/fonts/HarborSans-Condensed.ttf",
          properties: { win32FamilyNames: "Harbor Sans", fullName: "Harbor Sans Condensed" },
        },
        {
          name: "Black",
          weight: 900,
          style: "normal",
          filename: "/fonts/HarborSans-Black.ttf",
          properties: { win32FamilyNames: "Harbor Sans", fullName: "Harbor Sans Black" },
        },
      ],
    },
    {
      name: "Harbor Serif",
      variants: [
        {
          name: "Regular",
          weight: 400,
          style: "normal",
          filename: "/fonts/HarborSerif-Regular.otf",
          properties: { fullName: "Harbor Serif Regular", "1": "Copyright 2024 Example Foundry" },
        },
        {
          name: "Oblique",
          weight: 400,
          style: "oblique",
          filename: "/fonts/HarborSerif-Oblique.otf",
          properties: { fullName: "Harbor Serif Oblique" },
        },
        {
          name: "Light",
          weight: 300,
          style: "normal",
          filename: "/fonts/HarborSerif-Light.otf",
          properties: { fullName: "Harbor Serif Light" },
        },
      ],
    },
    {
      name: "Tideline Mono",
      variants: [
        {
          name: "Regular",
          weight: 400,
          style: "normal",
          filename: "/fonts/TidelineMono-Regular.ttf",
          properties: { fullName: "Tideline Mono Regular" },
        },
        {
          name: "Heavy",
          weight: 1000,
          style: "normal",
          filename: "/fonts/TidelineMono-Heavy.ttf",
          properties: { fullName: "Tideline Mono Heavy" },
        },
      ],
    },
    {
      name: "Quill Script",
      variants: [
        {
          name: "Italic",
          weight: 400,
          style: "italic",
          filename: "/fonts/QuillScript-Italic.ttf",
          properties: { fullName: "Quill Script Italic" },
        },
        {
          name: "Bold Italic",
          weight: 700,
          style: "italic",
          filename: "/fonts/QuillScript-BoldItalic.ttf",
          properties: { fullName: "Quill Script Bold Italic" },
        },
      ],
    },
    {
      name: "Dune Grotesk",
      variants: [
        {
          name: "Regular",
          weight: 400,
          style: "normal",
          width: 5,
          filename: "/fonts/DuneGrotesk-Regular.ttf",
          properties: { fullName: "Dune Grotesk Regular" },
        },
        {
          name: "Condensed Italic",
          weight: 400,
          style: "italic",
          width: 3,
          filename: "/fonts/DuneGrotesk-CondensedItalic.ttf",
          properties: { fullName: "Dune Grotesk Condensed Italic" },
        },
      ],
    },
  ];
}
