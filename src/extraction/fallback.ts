import { createPin, type Component } from "../model/schema.js";

type FallbackEntry = Omit<Component, "pins"> & { pins: string[] };

const MICROCONTROLLER_PINOUT = [
  "VIN",
  "GND",
  "5V",
  "3V3",
  "RESET",
  ...Array.from({ length: 14 }, (_, index) => `D${index}`),
  ...Array.from({ length: 6 }, (_, index) => `A${index}`),
];

const FALLBACK_SET: readonly FallbackEntry[] = [
  {
    id: "IC1",
    name: "ARDUINO_UNO_R3",
    type: "Microcontroller",
    value: "Arduino Uno R3",
    pins: MICROCONTROLLER_PINOUT,
    x: "100",
    y: "100",
  },
  { id: "D1", name: "LED-RED", type: "LED", value: "5mm Red LED", pins: ["A", "K"], x: "300", y: "150" },
  { id: "R1", name: "RES", type: "Resistor", value: "220Ω", pins: ["1", "2"], x: "250", y: "150" },
  {
    id: "SW1",
    name: "BUTTON",
    type: "Push Button",
    value: "Tactile Switch",
    pins: ["1", "2", "3", "4"],
    x: "150",
    y: "250",
  },
  { id: "PWR1", name: "5V", type: "Power Rail", value: "5V", pins: ["OUT"], x: "50", y: "50" },
  { id: "PWR2", name: "GND", type: "Power Rail", value: "0V (Ground)", pins: ["OUT"], x: "50", y: "300" },
];

/**
 * The fixed component set used when nothing could be extracted from an artifact.
 * Every call returns fresh objects with identical content.
 */
export function createFallbackComponents(): Component[] {
  return FALLBACK_SET.map((entry) => ({ ...entry, pins: entry.pins.map((name) => createPin(name)) }));
}
