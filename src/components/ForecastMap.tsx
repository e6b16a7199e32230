import { MapContainer, TileLayer, CircleMarker, Tooltip } from 'react-leaflet';
import type { EnrichedRecord } from '../types';

interface ForecastMapProps {
  records: EnrichedRecord[];
}

// Centred on Taiwan; the coordinate table covers nothing outside it.
const MAP_CENTER: [number, number] = [23.7, 120.95];

/** Colour a marker by daily maximum temperature. */
function temperatureColor(maxTemp: number): string {
  if (maxTemp >= 32) return '#dc2626';
  if (maxTemp >= 27) return '#f97316';
  if (maxTemp >= 20) return '#10b981';
  return '#3b82f6';
}

export default function ForecastMap({ records }: ForecastMapProps) {
  return (
    <MapContainer center={MAP_CENTER} zoom={7} scrollWheelZoom={false} className="h-[420px] w-full rounded-2xl">
      <TileLayer
        attribution='&copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors'
        url="https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png"
      />
      {records.map(record => (
        <CircleMarker
          key={`${record.id}-${record.date}`}
          center={[record.lat, record.lon]}
          radius={10}
          pathOptions={{ color: temperatureColor(record.max_temp), fillOpacity: 0.6 }}
        >
          <Tooltip>
            <strong>{record.location}</strong> · {record.date}
            <br />
            {record.min_temp}°C – {record.max_temp}°C, {record.description}
          </Tooltip>
        </CircleMarker>
      ))}
    </MapContainer>
  );
}
